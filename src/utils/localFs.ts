import * as fs from 'fs/promises';
import * as path from 'path';
import { LocalIoError, PathType, errorMessage } from '../types';

/**
 * Classify a local path from its filesystem metadata
 */
export async function getLocalPathType(localPath: string): Promise<PathType> {
    try {
        const stats = await fs.stat(localPath);
        return stats.isDirectory() ? 'directory' : 'file';
    } catch (error) {
        throw new LocalIoError(localPath, `Unable to stat '${localPath}': ${errorMessage(error)}`, error);
    }
}

export async function readLocalFile(localPath: string): Promise<Buffer> {
    try {
        return await fs.readFile(localPath);
    } catch (error) {
        throw new LocalIoError(localPath, `Unable to read '${localPath}': ${errorMessage(error)}`, error);
    }
}

/**
 * Write a file, creating its parent directory first
 */
export async function writeLocalFile(localPath: string, data: Buffer): Promise<void> {
    try {
        await fs.mkdir(path.dirname(localPath), { recursive: true });
        await fs.writeFile(localPath, data);
    } catch (error) {
        throw new LocalIoError(localPath, `Unable to write '${localPath}': ${errorMessage(error)}`, error);
    }
}
