import * as openpgp from "openpgp";
import type { PublicKey } from "openpgp";
import { VerificationError, errorMessage } from "../errors.js";
import type { Fetcher } from "./fetcher.js";

export function normalizeFingerprint(fingerprint: string): string {
    return fingerprint.replace(/\s+/g, "").toUpperCase();
}

/**
 * Keyserver lookup URL (VKS API) for a fingerprint.
 */
export function keyLookupUrl(keyserver: string, fingerprint: string): string {
    return `${keyserver.replace(/\/+$/, "")}/vks/v1/by-fingerprint/${normalizeFingerprint(fingerprint)}`;
}

/**
 * Parse an armored public key and accept it only if its primary fingerprint
 * is the pinned one.
 */
export async function readPinnedKey(armoredKey: string, fingerprint: string): Promise<PublicKey> {
    let key: PublicKey;
    try {
        key = (await openpgp.readKey({ armoredKey })).toPublic();
    } catch (err) {
        throw new VerificationError(`cannot read signing key: ${errorMessage(err)}`);
    }

    const expected = normalizeFingerprint(fingerprint);
    const actual = key.getFingerprint().toUpperCase();
    if (actual !== expected) {
        throw new VerificationError(`signing key fingerprint ${actual} does not match ${expected}`);
    }
    return key;
}

export async function fetchSigningKey(
    fetcher: Fetcher,
    fingerprint: string,
    keyserver: string,
): Promise<PublicKey> {
    const armored = (await fetcher.get(keyLookupUrl(keyserver, fingerprint))).toString("utf-8");
    return readPinnedKey(armored, fingerprint);
}

/**
 * Resolve only if `armoredSignature` holds a signature by `key` over exactly
 * `data`. Signatures by other keys in the same file are ignored.
 */
export async function verifyDetachedSignature(
    data: Uint8Array,
    armoredSignature: string,
    key: PublicKey,
): Promise<void> {
    let signature: openpgp.Signature;
    try {
        signature = await openpgp.readSignature({ armoredSignature });
    } catch (err) {
        throw new VerificationError(`malformed signature: ${errorMessage(err)}`);
    }

    const message = await openpgp.createMessage({ binary: data });
    const result = await openpgp.verify({
        message,
        signature,
        verificationKeys: key,
        format: "binary",
    });

    if (result.signatures.length === 0) {
        throw new VerificationError("no signatures found");
    }

    let firstFailure: string | null = null;
    for (const sig of result.signatures) {
        try {
            await sig.verified;
            return;
        } catch (err) {
            if (firstFailure === null) {
                firstFailure = errorMessage(err);
            }
        }
    }
    throw new VerificationError(firstFailure ?? "no valid signature");
}
