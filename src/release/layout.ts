import * as fs from "node:fs";
import * as path from "node:path";
import { walletDirectory } from "../config/network.js";
import { NETWORKS } from "../config/types.js";
import { ConfigError, SupervisorError } from "../errors.js";

export interface Owner {
    uid: number;
    gid: number;
}

export interface LayoutOptions {
    /** Electrum base directory, e.g. /home/electrum/.electrum */
    base: string;
    /** Path that should point at the base directory, e.g. /data */
    dataLink: string;
    owner?: Owner;
}

export interface LayoutResult {
    walletDirs: string[];
    link: string;
}

/**
 * Parse "uid:gid" (or a bare "uid", which then doubles as the gid).
 */
export function parseOwner(value: string): Owner {
    const match = value.trim().match(/^(\d+)(?::(\d+))?$/);
    if (!match) {
        throw new ConfigError(`owner must look like uid:gid, got "${value}"`);
    }
    const uid = parseInt(match[1], 10);
    const gid = match[2] !== undefined ? parseInt(match[2], 10) : uid;
    return { uid, gid };
}

function lstatOrNull(p: string): fs.Stats | null {
    try {
        return fs.lstatSync(p);
    } catch {
        return null;
    }
}

/**
 * Point `linkPath` at `target` the way `ln -sfn` would, except that an
 * existing real directory at `linkPath` (a mounted volume) receives the link
 * inside it under the target's own name.
 * @returns The path of the created link
 */
export function linkDataDirectory(target: string, linkPath: string): string {
    let location = linkPath;
    const existing = lstatOrNull(linkPath);
    if (existing?.isDirectory()) {
        location = path.join(linkPath, path.basename(path.resolve(target)));
    }

    const previous = location === linkPath ? existing : lstatOrNull(location);
    if (previous?.isDirectory()) {
        throw new SupervisorError(`Cannot replace directory ${location} with a link`);
    }
    if (previous !== null) {
        fs.unlinkSync(location);
    }

    fs.symlinkSync(target, location, "dir");
    return location;
}

/**
 * Change ownership of a tree without following links.
 */
export function chownRecursive(root: string, owner: Owner): void {
    fs.lchownSync(root, owner.uid, owner.gid);
    const stat = fs.lstatSync(root);
    if (!stat.isDirectory()) return;

    for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
        chownRecursive(path.join(root, entry.name), owner);
    }
}

/**
 * Create the per-network wallet directories, link the data path to the base
 * directory and hand both to the daemon's account.
 */
export function prepareDataLayout(options: LayoutOptions): LayoutResult {
    const walletDirs = NETWORKS.map((network) => walletDirectory(options.base, network));
    for (const dir of walletDirs) {
        fs.mkdirSync(dir, { recursive: true });
    }

    const link = linkDataDirectory(options.base, options.dataLink);

    if (options.owner) {
        chownRecursive(options.base, options.owner);
        fs.lchownSync(link, options.owner.uid, options.owner.gid);
    }

    return { walletDirs, link };
}
