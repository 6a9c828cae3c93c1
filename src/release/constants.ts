/** Electrum release the image is built from */
export const ELECTRUM_VERSION = "4.0.9";

export const DOWNLOAD_HOST = "https://download.electrum.org";

/** Primary key fingerprint of the Electrum release signer */
export const SIGNING_KEY_FINGERPRINT = "6694D8DE7BE8EE5631BED9502BD5824B7F9470E6";

export const KEYSERVER = "https://keys.openpgp.org";

/** Electrum's home directory for the unprivileged account */
export const ELECTRUM_HOME = "/home/electrum/.electrum";

/** Mount point of the data volume */
export const DATA_LINK = "/data";

export interface ReleaseUrls {
    archive: string;
    signature: string;
}

export function archiveName(version: string): string {
    return `Electrum-${version}.tar.gz`;
}

export function releaseUrls(version: string, host: string = DOWNLOAD_HOST): ReleaseUrls {
    const archive = `${host.replace(/\/+$/, "")}/${version}/${archiveName(version)}`;
    return { archive, signature: `${archive}.asc` };
}
