import {
    BasicFtpTransport,
    FtpCredentials,
    FtpMethod,
    FtpMethods,
    FtpRequest,
    FtpResponse,
    FtpTransport,
    getRequestPath,
    readListing
} from '../clients';
import { InvalidArgumentError, UnsupportedOperationError } from '../types';
import { Logger, getLocalPathType, joinPath, readLocalFile, writeLocalFile } from '../utils';

/**
 * FTP-only file operations addressed by a base URI and explicit credentials.
 * Prefer TransferClient, which covers both protocols.
 */
export class FtpFileService {
    private readonly transport: FtpTransport;

    constructor(transport?: FtpTransport) {
        this.transport = transport ?? new BasicFtpTransport();
    }

    /**
     * Names listed under the URI
     */
    async listFiles(uri: URL, credentials: FtpCredentials): Promise<string[]> {
        requireTarget(uri, credentials);

        const response = await this.send(uri, credentials, FtpMethods.ListDirectory);
        return readListing(response.body);
    }

    async uploadFile(uri: URL, credentials: FtpCredentials, localFilePath: string, remoteFileName: string): Promise<void> {
        requireTarget(uri, credentials);
        requireString(localFilePath, 'localFilePath');
        requireString(remoteFileName, 'remoteFileName');

        if (await getLocalPathType(localFilePath) === 'directory') {
            throw new UnsupportedOperationError(`'${localFilePath}' is a directory`);
        }
        const data = await readLocalFile(localFilePath);

        await this.send(appendToUri(uri, remoteFileName), credentials, FtpMethods.UploadFile, { body: data });
        Logger.success(`Uploaded: ${remoteFileName}`);
    }

    async downloadFile(uri: URL, credentials: FtpCredentials, remoteFileName: string, localFilePath: string): Promise<void> {
        requireTarget(uri, credentials);
        requireString(remoteFileName, 'remoteFileName');
        requireString(localFilePath, 'localFilePath');

        const response = await this.send(appendToUri(uri, remoteFileName), credentials, FtpMethods.DownloadFile);
        await writeLocalFile(localFilePath, response.body);
        Logger.success(`Downloaded: ${remoteFileName}`);
    }

    async deleteFile(uri: URL, credentials: FtpCredentials, remoteFileName: string): Promise<void> {
        requireTarget(uri, credentials);
        requireString(remoteFileName, 'remoteFileName');

        await this.send(appendToUri(uri, remoteFileName), credentials, FtpMethods.DeleteFile);
    }

    /**
     * Unlike FtpClient.renameFile, the new name is sent as given.
     */
    async renameFile(uri: URL, credentials: FtpCredentials, remoteFileName: string, newName: string): Promise<void> {
        requireTarget(uri, credentials);
        requireString(remoteFileName, 'remoteFileName');
        requireString(newName, 'newName');

        await this.send(appendToUri(uri, remoteFileName), credentials, FtpMethods.Rename, { renameTo: newName });
    }

    async makeDirectory(uri: URL, credentials: FtpCredentials, directory: string): Promise<void> {
        requireTarget(uri, credentials);
        requireString(directory, 'directory');

        await this.send(appendToUri(uri, directory), credentials, FtpMethods.MakeDirectory);
    }

    async removeDirectory(uri: URL, credentials: FtpCredentials, directory: string): Promise<void> {
        requireTarget(uri, credentials);
        requireString(directory, 'directory');

        await this.send(appendToUri(uri, directory), credentials, FtpMethods.RemoveDirectory);
    }

    private send(
        uri: URL,
        credentials: FtpCredentials,
        method: FtpMethod,
        extra: Pick<FtpRequest, 'renameTo' | 'body'> = {}
    ): Promise<FtpResponse> {
        Logger.debug(`FTP ${method} ${uri.href}`);
        return this.transport.execute({ uri, method, credentials, ...extra });
    }
}

/**
 * Copy of `uri` with `name` appended to its path
 */
export function appendToUri(uri: URL, name: string): URL {
    const result = new URL(uri.href);
    const remotePath = joinPath('/', getRequestPath(uri), name);
    result.pathname = remotePath.split('/').map(encodeURIComponent).join('/');
    return result;
}

function requireTarget(uri: URL | null | undefined, credentials: FtpCredentials | null | undefined): void {
    if (!(uri instanceof URL)) {
        throw new InvalidArgumentError('uri');
    }
    if (uri.protocol !== 'ftp:') {
        throw new InvalidArgumentError('uri', `Not an FTP URI: ${uri.href}`);
    }
    if (!credentials) {
        throw new InvalidArgumentError('credentials');
    }
}

function requireString(value: string | null | undefined, argument: string): void {
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidArgumentError(argument);
    }
}
