import { DownloadError } from "../errors.js";

/**
 * Minimal HTTP GET used by the release installer, so tests can serve bytes
 * from memory.
 */
export interface Fetcher {
    get(url: string): Promise<Buffer>;
}

export const httpFetcher: Fetcher = {
    async get(url: string): Promise<Buffer> {
        const res = await fetch(url, { redirect: "follow" });
        if (!res.ok) {
            throw new DownloadError(url, res.status);
        }
        return Buffer.from(await res.arrayBuffer());
    },
};
