import * as path from 'path';

/**
 * Normalize path separators to forward slashes
 */
export function normalizePath(filePath: string): string {
    return filePath.replace(/\\/g, '/');
}

/**
 * Join remote path segments
 */
export function joinPath(...parts: string[]): string {
    return path.posix.join(...parts.map(normalizePath));
}

/**
 * Ensure path ends with separator
 */
export function ensureTrailingSlash(dirPath: string): string {
    const normalized = normalizePath(dirPath);
    return normalized.endsWith('/') ? normalized : normalized + '/';
}

/**
 * Last segment of a local or remote path
 */
export function getFilename(filePath: string): string {
    return path.posix.basename(normalizePath(filePath));
}

/**
 * Resolve a remote name against a remote working directory
 */
export function resolveRemotePath(workingDir: string, name: string): string {
    return path.posix.resolve('/', normalizePath(workingDir), normalizePath(name));
}
