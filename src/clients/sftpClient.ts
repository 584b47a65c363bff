import SftpClient from 'ssh2-sftp-client';
import { ConnectionDescriptor, PathType, RemoteOperationError, errorMessage, getDefaultPort } from '../types';
import { Logger, resolveRemotePath } from '../utils';
import { RemoteClient, RemoteClientOptions } from './remoteClient';

/**
 * The part of ssh2-sftp-client a driver session uses
 */
export interface SftpSession {
    connect(options: SftpClient.ConnectOptions): Promise<unknown>;
    realPath(remotePath: string): Promise<string>;
    list(remotePath: string): Promise<Array<{ name: string }>>;
    stat(remotePath: string): Promise<{ isDirectory: boolean }>;
    put(input: Buffer, remotePath: string): Promise<unknown>;
    get(remotePath: string): Promise<unknown>;
    delete(remotePath: string): Promise<unknown>;
    rename(fromPath: string, toPath: string): Promise<unknown>;
    mkdir(remotePath: string): Promise<unknown>;
    rmdir(remotePath: string): Promise<unknown>;
    end(): Promise<unknown>;
}

export type SftpSessionFactory = () => SftpSession;

/**
 * SFTP driver using ssh2-sftp-client. Every operation connects, resolves the
 * working path, performs one call and ends the session.
 */
export class SftpClientWrapper extends RemoteClient {
    readonly protocol = 'sftp' as const;
    private readonly createSession: SftpSessionFactory;

    constructor(options: Partial<RemoteClientOptions> = {}, createSession?: SftpSessionFactory) {
        super(options);
        this.createSession = createSession ?? (() => new SftpClient());
    }

    /**
     * Entry names in the order the server reported them
     */
    async listDirectory(conn: ConnectionDescriptor): Promise<string[]> {
        return this.withSession(conn, 'list', async (session, workingDir) => {
            const entries = await session.list(workingDir);
            return entries.map(entry => entry.name);
        });
    }

    async getPathType(conn: ConnectionDescriptor, name: string): Promise<PathType> {
        return this.withSession(conn, 'stat', async (session, workingDir) => {
            const stats = await session.stat(resolveRemotePath(workingDir, name));
            return stats.isDirectory ? 'directory' : 'file';
        });
    }

    async deleteFile(conn: ConnectionDescriptor, name: string): Promise<void> {
        await this.withSession(conn, 'delete', async (session, workingDir) => {
            Logger.debug(`Deleting remote file: ${name}`);
            await session.delete(resolveRemotePath(workingDir, name));
            Logger.success(`Deleted: ${name}`);
        });
    }

    /**
     * The rename target is the new name resolved against the working directory.
     */
    async renameFile(conn: ConnectionDescriptor, name: string, newName: string): Promise<void> {
        await this.withSession(conn, 'rename', async (session, workingDir) => {
            Logger.debug(`Renaming ${name} to ${newName}`);
            await session.rename(resolveRemotePath(workingDir, name), resolveRemotePath(workingDir, newName));
            Logger.success(`Renamed: ${name} -> ${newName}`);
        });
    }

    async makeDirectory(conn: ConnectionDescriptor, name: string): Promise<void> {
        await this.withSession(conn, 'mkdir', async (session, workingDir) => {
            Logger.debug(`Creating remote directory: ${name}`);
            await session.mkdir(resolveRemotePath(workingDir, name));
        });
    }

    async removeDirectory(conn: ConnectionDescriptor, name: string): Promise<void> {
        await this.withSession(conn, 'rmdir', async (session, workingDir) => {
            Logger.debug(`Deleting remote directory: ${name}`);
            await session.rmdir(resolveRemotePath(workingDir, name));
            Logger.success(`Deleted directory: ${name}`);
        });
    }

    protected async writeRemoteFile(conn: ConnectionDescriptor, name: string, data: Buffer): Promise<void> {
        await this.withSession(conn, 'put', async (session, workingDir) => {
            await session.put(data, resolveRemotePath(workingDir, name));
        });
    }

    protected async readRemoteFile(conn: ConnectionDescriptor, name: string): Promise<Buffer> {
        return this.withSession(conn, 'get', async (session, workingDir) => {
            const data = await session.get(resolveRemotePath(workingDir, name));
            if (!Buffer.isBuffer(data)) {
                throw new RemoteOperationError(`SFTP get returned no data for ${name}`);
            }
            return data;
        });
    }

    private getConnectOptions(conn: ConnectionDescriptor): SftpClient.ConnectOptions {
        const connectionOptions: SftpClient.ConnectOptions = {
            host: conn.host,
            username: conn.username,
            password: conn.password,
            readyTimeout: this.options.timeout
        };

        if (conn.explicitPort) {
            connectionOptions.port = conn.explicitPort;
        }

        if (this.options.debug) {
            connectionOptions.debug = (msg: string) => Logger.debug(`SFTP: ${msg}`);
        }

        return connectionOptions;
    }

    private async withSession<T>(
        conn: ConnectionDescriptor,
        operation: string,
        action: (session: SftpSession, workingDir: string) => Promise<T>
    ): Promise<T> {
        const session = this.createSession();

        try {
            Logger.debug(`Connecting to SFTP server ${conn.host}:${conn.explicitPort ?? getDefaultPort('sftp')}...`);
            await session.connect(this.getConnectOptions(conn));

            const workingDir = await session.realPath(conn.workingPath || '.');
            if (!workingDir) {
                throw new RemoteOperationError(`No such remote directory: ${conn.workingPath}`);
            }

            return await action(session, workingDir);
        } catch (error) {
            Logger.error(`SFTP ${operation} failed: ${errorMessage(error)}`);
            throw toRemoteOperationError(operation, error);
        } finally {
            await this.endSession(session);
        }
    }

    private async endSession(session: SftpSession): Promise<void> {
        try {
            await session.end();
        } catch (error) {
            Logger.debug(`Error closing SFTP session: ${errorMessage(error)}`);
        }
    }
}

function toRemoteOperationError(operation: string, error: unknown): RemoteOperationError {
    if (error instanceof RemoteOperationError) {
        return error;
    }

    let status: number | string | undefined;
    if (error instanceof Error && 'code' in error) {
        const code: unknown = error.code;
        if (typeof code === 'number' || typeof code === 'string') {
            status = code;
        }
    }

    return new RemoteOperationError(`SFTP ${operation} failed: ${errorMessage(error)}`, status, error);
}
