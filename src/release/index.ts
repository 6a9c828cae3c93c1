export {
    ELECTRUM_VERSION,
    DOWNLOAD_HOST,
    SIGNING_KEY_FINGERPRINT,
    KEYSERVER,
    ELECTRUM_HOME,
    DATA_LINK,
    archiveName,
    releaseUrls,
} from "./constants.js";
export type { ReleaseUrls } from "./constants.js";
export { httpFetcher } from "./fetcher.js";
export type { Fetcher } from "./fetcher.js";
export {
    fetchSigningKey,
    keyLookupUrl,
    normalizeFingerprint,
    readPinnedKey,
    verifyDetachedSignature,
} from "./verify.js";
export { installRelease } from "./install.js";
export type { InstallOptions } from "./install.js";
export { prepareDataLayout, linkDataDirectory, chownRecursive, parseOwner } from "./layout.js";
export type { LayoutOptions, LayoutResult, Owner } from "./layout.js";
