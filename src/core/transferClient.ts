import * as path from 'path';
import { DriverMap, RemoteClient, RemoteClientOptions, createDrivers } from '../clients';
import { ConnectionDescriptor, InvalidArgumentError, PathType } from '../types';
import { Logger } from '../utils';

export interface TransferClientOptions extends Partial<RemoteClientOptions> {
    /** Drivers to dispatch to instead of the default FTP and SFTP ones */
    drivers?: DriverMap;
}

/**
 * Unified FTP/SFTP client.
 *
 * Every operation validates its arguments, picks the driver registered for
 * `conn.protocol` and hands the call over. Nothing is retried and no other
 * protocol is tried when the chosen driver fails.
 */
export class TransferClient {
    private readonly drivers: DriverMap;

    constructor(options: TransferClientOptions = {}) {
        const { drivers, ...clientOptions } = options;

        if (clientOptions.debug) {
            Logger.setDebugMode(true);
        }

        this.drivers = drivers ?? createDrivers(clientOptions);
    }

    /**
     * List the entries of the connection's working directory
     */
    async listDirectory(conn: ConnectionDescriptor): Promise<string[]> {
        requireConnection(conn);
        return this.driverFor(conn).listDirectory(conn);
    }

    /**
     * Upload a local file. The remote name defaults to the local base name.
     * Local directories are rejected with UnsupportedOperationError.
     */
    async upload(conn: ConnectionDescriptor, sourcePath: string, destinationName?: string): Promise<void> {
        requireConnection(conn);
        requireString(sourcePath, 'sourcePath');

        const remoteName = destinationName || path.basename(sourcePath);
        await this.driverFor(conn).upload(conn, sourcePath, remoteName);
    }

    /**
     * Download a remote file into `destinationPath`, named `destinationName` or
     * else the remote name. Remote directories are rejected with UnsupportedOperationError.
     */
    async download(
        conn: ConnectionDescriptor,
        sourceName: string,
        destinationPath: string,
        destinationName?: string
    ): Promise<void> {
        requireConnection(conn);
        requireString(sourceName, 'sourceName');
        requireString(destinationPath, 'destinationPath');

        const localPath = path.join(destinationPath, destinationName || sourceName);
        await this.driverFor(conn).download(conn, sourceName, localPath);
    }

    async deleteFile(conn: ConnectionDescriptor, name: string): Promise<void> {
        requireConnection(conn);
        requireString(name, 'name');
        await this.driverFor(conn).deleteFile(conn, name);
    }

    async renameFile(conn: ConnectionDescriptor, name: string, newName: string): Promise<void> {
        requireConnection(conn);
        requireString(name, 'name');
        requireString(newName, 'newName');
        await this.driverFor(conn).renameFile(conn, name, newName);
    }

    async makeDirectory(conn: ConnectionDescriptor, name: string): Promise<void> {
        requireConnection(conn);
        requireString(name, 'name');
        await this.driverFor(conn).makeDirectory(conn, name);
    }

    async removeDirectory(conn: ConnectionDescriptor, name: string): Promise<void> {
        requireConnection(conn);
        requireString(name, 'name');
        await this.driverFor(conn).removeDirectory(conn, name);
    }

    /**
     * Classify a remote name. Re-evaluated on every call.
     */
    async getPathType(conn: ConnectionDescriptor, name: string): Promise<PathType> {
        requireConnection(conn);
        requireString(name, 'name');
        return this.driverFor(conn).getPathType(conn, name);
    }

    private driverFor(conn: ConnectionDescriptor): RemoteClient {
        const driver = this.drivers[conn.protocol];
        if (!driver) {
            throw new InvalidArgumentError('conn', `No driver for protocol: ${conn.protocol}`);
        }
        return driver;
    }
}

function requireConnection(conn: ConnectionDescriptor | null | undefined): asserts conn is ConnectionDescriptor {
    if (conn === null || conn === undefined) {
        throw new InvalidArgumentError('conn');
    }
}

function requireString(value: string | null | undefined, argument: string): asserts value is string {
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidArgumentError(argument);
    }
}
