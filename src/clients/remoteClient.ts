import { ConnectionDescriptor, PathType, Protocol, UnsupportedOperationError, errorMessage } from '../types';
import { Logger, getLocalPathType, readLocalFile, writeLocalFile } from '../utils';

/**
 * Settings shared by every protocol driver
 */
export interface RemoteClientOptions {
    timeout: number;
    secure: boolean;
    debug: boolean;
}

export const DEFAULT_CLIENT_OPTIONS: RemoteClientOptions = {
    timeout: 30000,
    secure: false,
    debug: false
};

/**
 * Abstract base class for protocol drivers (FTP/SFTP).
 *
 * Drivers hold no connection state: each operation receives the connection
 * descriptor, opens what it needs and releases it before settling. Upload and
 * download are implemented here on top of the single-file primitives; both
 * classify the source before moving any bytes.
 */
export abstract class RemoteClient {
    abstract readonly protocol: Protocol;
    protected readonly options: RemoteClientOptions;

    constructor(options: Partial<RemoteClientOptions> = {}) {
        this.options = { ...DEFAULT_CLIENT_OPTIONS, ...options };
    }

    /**
     * Names of the entries in the working directory, in server order
     */
    abstract listDirectory(conn: ConnectionDescriptor): Promise<string[]>;

    /**
     * Decide whether a remote name is a file or a directory
     */
    abstract getPathType(conn: ConnectionDescriptor, name: string): Promise<PathType>;

    abstract deleteFile(conn: ConnectionDescriptor, name: string): Promise<void>;

    abstract renameFile(conn: ConnectionDescriptor, name: string, newName: string): Promise<void>;

    abstract makeDirectory(conn: ConnectionDescriptor, name: string): Promise<void>;

    abstract removeDirectory(conn: ConnectionDescriptor, name: string): Promise<void>;

    protected abstract writeRemoteFile(conn: ConnectionDescriptor, name: string, data: Buffer): Promise<void>;

    protected abstract readRemoteFile(conn: ConnectionDescriptor, name: string): Promise<Buffer>;

    /**
     * Upload a local file under the given remote name
     */
    async upload(conn: ConnectionDescriptor, localPath: string, remoteName: string): Promise<void> {
        const pathType = await getLocalPathType(localPath);
        if (pathType === 'directory') {
            throw new UnsupportedOperationError(`Unable to upload directory '${localPath}': no recursive transfer`);
        }

        const data = await readLocalFile(localPath);

        try {
            Logger.debug(`Uploading ${localPath} to ${this.protocol}:${remoteName}`);
            await this.writeRemoteFile(conn, remoteName, data);
            Logger.success(`Uploaded: ${remoteName}`);
        } catch (error) {
            Logger.error(`Failed to upload ${localPath}: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Download a remote file to a local file path. Drivers whose classification
     * is a guess may override this.
     */
    async download(conn: ConnectionDescriptor, remoteName: string, localPath: string): Promise<void> {
        const pathType = await this.getPathType(conn, remoteName);
        if (pathType === 'directory') {
            throw new UnsupportedOperationError(`Unable to download directory '${remoteName}': no recursive transfer`);
        }

        let data: Buffer;
        try {
            Logger.debug(`Downloading ${this.protocol}:${remoteName} to ${localPath}`);
            data = await this.readRemoteFile(conn, remoteName);
        } catch (error) {
            Logger.error(`Failed to download ${remoteName}: ${errorMessage(error)}`);
            throw error;
        }

        await writeLocalFile(localPath, data);
        Logger.success(`Downloaded: ${remoteName}`);
    }
}
