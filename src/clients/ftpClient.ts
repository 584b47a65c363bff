import {
    ConnectionDescriptor,
    InvalidArgumentError,
    LocalIoError,
    PathType,
    RemoteOperationError,
    UnsupportedOperationError,
    errorMessage
} from '../types';
import { Logger, ensureTrailingSlash, getFilename, joinPath, getLocalPathType, writeLocalFile } from '../utils';
import { RemoteClient, RemoteClientOptions } from './remoteClient';
import {
    BasicFtpTransport,
    FtpMethod,
    FtpMethods,
    FtpRequest,
    FtpResponse,
    FtpStatusCode,
    FtpTransport,
    readListing
} from './ftpTransport';

/**
 * Classification of a name after a LIST probe against it failed, keyed by FTP reply code.
 *
 * This is a heuristic: a server that answers a missing file with another code
 * than 550 gets the name classified as a directory.
 */
export const PROBE_FAILURE_PATH_TYPES: ReadonlyMap<number, PathType> = new Map<number, PathType>([
    [FtpStatusCode.ActionNotTakenFileUnavailable, 'file']
]);

/** Classification when the probe succeeds */
export const PROBE_SUCCESS_PATH_TYPE: PathType = 'directory';

/** Classification for failures missing from the table, including ones without a reply code */
export const PROBE_FALLBACK_PATH_TYPE: PathType = 'directory';

export function classifyProbeFailure(status?: number | string): PathType {
    if (typeof status === 'number') {
        return PROBE_FAILURE_PATH_TYPES.get(status) ?? PROBE_FALLBACK_PATH_TYPE;
    }
    return PROBE_FALLBACK_PATH_TYPE;
}

/**
 * Build the request URI for a name in the connection's working path.
 * Only the last segment of `name` is used. Without a name the URI addresses
 * the working directory itself.
 */
export function buildFtpUri(conn: ConnectionDescriptor, name?: string): URL {
    const host = conn.host.includes(':') && !conn.host.startsWith('[') ? `[${conn.host}]` : conn.host;
    const port = conn.explicitPort ? `:${conn.explicitPort}` : '';

    let uri: URL;
    try {
        uri = new URL(`ftp://${host}${port}/`);
    } catch {
        throw new InvalidArgumentError('host', `Invalid FTP host: ${conn.host}`);
    }

    const basePath = joinPath('/', conn.workingPath);
    const remotePath = name ? joinPath(basePath, getFilename(name)) : ensureTrailingSlash(basePath);
    uri.pathname = remotePath.split('/').map(encodeURIComponent).join('/');

    return uri;
}

/**
 * FTP driver. Each operation is a single request on a fresh transport connection.
 */
export class FtpClient extends RemoteClient {
    readonly protocol = 'ftp' as const;
    private readonly transport: FtpTransport;

    constructor(options: Partial<RemoteClientOptions> = {}, transport?: FtpTransport) {
        super(options);
        this.transport = transport ?? new BasicFtpTransport({
            timeout: this.options.timeout,
            secure: this.options.secure,
            verbose: this.options.debug
        });
    }

    async listDirectory(conn: ConnectionDescriptor): Promise<string[]> {
        try {
            const response = await this.request(conn, FtpMethods.ListDirectory);
            return readListing(response.body);
        } catch (error) {
            Logger.error(`Failed to list directory ${conn.workingPath || '/'}: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Probe the name with LIST: success means directory, a failure is looked up
     * in PROBE_FAILURE_PATH_TYPES. Many servers also list a plain file, which
     * this reports as a directory.
     */
    async getPathType(conn: ConnectionDescriptor, name: string): Promise<PathType> {
        try {
            await this.request(conn, FtpMethods.ListDirectory, name);
            return PROBE_SUCCESS_PATH_TYPE;
        } catch (error) {
            if (!(error instanceof RemoteOperationError)) {
                throw error;
            }
            const pathType = classifyProbeFailure(error.status);
            Logger.debug(`Probe of ${name} failed with ${error.status ?? 'no status'}, treating as ${pathType}`);
            return pathType;
        }
    }

    /**
     * Retrieve a remote file without probing it first. Only an existing local
     * directory at `localPath` is rejected; RETR on a remote directory fails on the server.
     */
    async download(conn: ConnectionDescriptor, remoteName: string, localPath: string): Promise<void> {
        if (await isLocalDirectory(localPath)) {
            throw new UnsupportedOperationError(`Unable to download into directory '${localPath}': no recursive transfer`);
        }

        let data: Buffer;
        try {
            Logger.debug(`Downloading ftp:${remoteName} to ${localPath}`);
            data = await this.readRemoteFile(conn, remoteName);
        } catch (error) {
            Logger.error(`Failed to download ${remoteName}: ${errorMessage(error)}`);
            throw error;
        }

        await writeLocalFile(localPath, data);
        Logger.success(`Downloaded: ${remoteName}`);
    }

    async deleteFile(conn: ConnectionDescriptor, name: string): Promise<void> {
        try {
            Logger.debug(`Deleting remote file: ${name}`);
            await this.request(conn, FtpMethods.DeleteFile, name);
            Logger.success(`Deleted: ${name}`);
        } catch (error) {
            Logger.error(`Failed to delete ${name}: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * The rename target is the full URI of the new name, not a bare name.
     */
    async renameFile(conn: ConnectionDescriptor, name: string, newName: string): Promise<void> {
        const renameTo = buildFtpUri(conn, newName).href;

        try {
            Logger.debug(`Renaming ${name} to ${renameTo}`);
            await this.request(conn, FtpMethods.Rename, name, { renameTo });
            Logger.success(`Renamed: ${name} -> ${newName}`);
        } catch (error) {
            Logger.error(`Failed to rename ${name}: ${errorMessage(error)}`);
            throw error;
        }
    }

    async makeDirectory(conn: ConnectionDescriptor, name: string): Promise<void> {
        try {
            Logger.debug(`Creating remote directory: ${name}`);
            await this.request(conn, FtpMethods.MakeDirectory, name);
        } catch (error) {
            Logger.error(`Failed to create directory ${name}: ${errorMessage(error)}`);
            throw error;
        }
    }

    async removeDirectory(conn: ConnectionDescriptor, name: string): Promise<void> {
        try {
            Logger.debug(`Deleting remote directory: ${name}`);
            await this.request(conn, FtpMethods.RemoveDirectory, name);
            Logger.success(`Deleted directory: ${name}`);
        } catch (error) {
            Logger.error(`Failed to delete directory ${name}: ${errorMessage(error)}`);
            throw error;
        }
    }

    protected async writeRemoteFile(conn: ConnectionDescriptor, name: string, data: Buffer): Promise<void> {
        await this.request(conn, FtpMethods.UploadFile, name, { body: data });
    }

    protected async readRemoteFile(conn: ConnectionDescriptor, name: string): Promise<Buffer> {
        const response = await this.request(conn, FtpMethods.DownloadFile, name);
        return response.body;
    }

    private request(
        conn: ConnectionDescriptor,
        method: FtpMethod,
        name?: string,
        extra: Pick<FtpRequest, 'renameTo' | 'body'> = {}
    ): Promise<FtpResponse> {
        return this.transport.execute({
            uri: buildFtpUri(conn, name),
            method,
            credentials: { username: conn.username, password: conn.securePassword },
            ...extra
        });
    }
}

async function isLocalDirectory(localPath: string): Promise<boolean> {
    try {
        return await getLocalPathType(localPath) === 'directory';
    } catch (error) {
        const cause = error instanceof LocalIoError ? error.cause : undefined;
        if (cause instanceof Error && 'code' in cause && cause.code === 'ENOENT') {
            return false;
        }
        throw error;
    }
}
