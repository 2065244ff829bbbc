import * as path from 'path';
import * as fs from 'fs';

/**
 * Validates if a path resolves to a location within the allowed root directory.
 * It checks against path traversal (..) and symlinks pointing outside the root.
 *
 * @param inputPath The path to validate (relative or absolute).
 * @param root The allowed root directory (default: process.cwd()).
 */
export function isSafePath(inputPath: string, root: string = process.cwd()): boolean {
    const resolvedPath = path.resolve(root, inputPath);
    const allowedRoot = path.resolve(root);

    if (!isInside(resolvedPath, allowedRoot)) {
        return false;
    }

    // An existing entry may be a symlink that leaves the root.
    if (fs.existsSync(resolvedPath)) {
        try {
            return isInside(fs.realpathSync(resolvedPath), fs.realpathSync(allowedRoot));
        } catch {
            return false;
        }
    }

    return true;
}

/**
 * File name to store a downloaded report under: the last path segment of the
 * URL, or testr_results.html when the URL ends in a slash.
 */
export function downloadFileName(url: string): string {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        pathname = url.split(/[?#]/)[0];
    }
    const raw = pathname.split("/").pop() ?? "";
    let segment: string;
    try {
        segment = decodeURIComponent(raw);
    } catch {
        segment = raw;
    }
    return segment || "testr_results.html";
}

function isInside(candidate: string, root: string): boolean {
    // path.sep avoids treating /app_secret as inside /app
    return candidate === root || candidate.startsWith(root + path.sep);
}
