import * as ftp from 'basic-ftp';
import { Readable, Writable } from 'stream';
import { RemoteOperationError, SecureSecret, errorMessage, getDefaultPort } from '../types';
import { Logger } from '../utils';

/**
 * Request methods understood by the transport
 */
export const FtpMethods = {
    ListDirectory: 'LIST',
    UploadFile: 'STOR',
    DownloadFile: 'RETR',
    DeleteFile: 'DELE',
    Rename: 'RENAME',
    MakeDirectory: 'MKD',
    RemoveDirectory: 'RMD'
} as const;

export type FtpMethod = typeof FtpMethods[keyof typeof FtpMethods];

export const FtpStatusCode = {
    ActionNotTakenFileUnavailable: 550
} as const;

export interface FtpCredentials {
    username: string;
    password: SecureSecret;
}

export interface FtpRequest {
    uri: URL;
    method: FtpMethod;
    credentials: FtpCredentials;
    /** RNTO argument, sent verbatim */
    renameTo?: string;
    /** STOR payload */
    body?: Buffer;
}

export interface FtpResponse {
    /** LIST names one per line, or RETR bytes; empty for other methods */
    body: Buffer;
}

/**
 * Stateless request-per-operation FTP transport
 */
export interface FtpTransport {
    execute(request: FtpRequest): Promise<FtpResponse>;
}

/**
 * The part of a basic-ftp client the transport uses
 */
export type FtpSession = Pick<ftp.Client, 'access' | 'list' | 'uploadFrom' | 'downloadTo' | 'remove' | 'rename' | 'send' | 'close'> & {
    ftp: { verbose: boolean };
};

export type FtpSessionFactory = (timeout: number) => FtpSession;

export interface BasicFtpTransportOptions {
    timeout: number;
    secure: boolean;
    verbose: boolean;
}

/**
 * Split a listing body into entries, stopping at the first blank line or end of data.
 * The terminator is part of the result as an empty entry, so a listing with a
 * blank-named entry is cut short there.
 */
export function readListing(body: Buffer): string[] {
    const lines = body.toString('utf8').split(/\r?\n/);
    const result: string[] = [];

    for (const line of lines) {
        result.push(line);
        if (line === '') {
            return result;
        }
    }

    result.push('');
    return result;
}

/**
 * Path component of a request URI
 */
export function getRequestPath(uri: URL): string {
    return decodeURIComponent(uri.pathname);
}

/**
 * FTP transport using basic-ftp. Every request opens its own control connection
 * and closes it before the returned promise settles.
 */
export class BasicFtpTransport implements FtpTransport {
    private readonly options: BasicFtpTransportOptions;
    private readonly createSession: FtpSessionFactory;

    constructor(options: Partial<BasicFtpTransportOptions> = {}, createSession?: FtpSessionFactory) {
        this.options = {
            timeout: options.timeout ?? 30000,
            secure: options.secure ?? false,
            verbose: options.verbose ?? false
        };
        this.createSession = createSession ?? (timeout => new ftp.Client(timeout));
    }

    async execute(request: FtpRequest): Promise<FtpResponse> {
        const client = this.createSession(this.options.timeout);
        client.ftp.verbose = this.options.verbose;

        const host = request.uri.hostname.replace(/^\[|\]$/g, '');
        const port = request.uri.port ? Number(request.uri.port) : getDefaultPort('ftp');

        try {
            await client.access({
                host,
                port,
                user: request.credentials.username,
                password: request.credentials.password.reveal(),
                secure: this.options.secure
            });

            return await this.send(client, request);
        } catch (error) {
            throw toRemoteOperationError(request, error);
        } finally {
            client.close();
        }
    }

    private async send(client: FtpSession, request: FtpRequest): Promise<FtpResponse> {
        const remotePath = getRequestPath(request.uri);

        switch (request.method) {
            case FtpMethods.ListDirectory: {
                const entries = await client.list(remotePath);
                const listing = entries.map(entry => entry.name + '\r\n').join('');
                return { body: Buffer.from(listing, 'utf8') };
            }
            case FtpMethods.UploadFile:
                return fromResponse(await client.uploadFrom(Readable.from(request.body ?? Buffer.alloc(0)), remotePath));
            case FtpMethods.DownloadFile: {
                const chunks: Buffer[] = [];
                const sink = new Writable({
                    write(chunk: Buffer, _encoding, callback) {
                        chunks.push(Buffer.from(chunk));
                        callback();
                    }
                });
                const response = await client.downloadTo(sink, remotePath);
                return fromResponse(response, Buffer.concat(chunks));
            }
            case FtpMethods.DeleteFile:
                return fromResponse(await client.remove(remotePath));
            case FtpMethods.Rename: {
                if (!request.renameTo) {
                    throw new RemoteOperationError('Rename request without a target');
                }
                return fromResponse(await client.rename(remotePath, request.renameTo));
            }
            case FtpMethods.MakeDirectory:
                return fromResponse(await client.send('MKD ' + remotePath));
            case FtpMethods.RemoveDirectory:
                return fromResponse(await client.send('RMD ' + remotePath));
        }
    }
}

function fromResponse(response: ftp.FTPResponse, body: Buffer = Buffer.alloc(0)): FtpResponse {
    Logger.debug(`FTP reply ${response.code} ${response.message}`);
    return { body };
}

function toRemoteOperationError(request: FtpRequest, error: unknown): RemoteOperationError {
    if (error instanceof RemoteOperationError) {
        return error;
    }

    const status = error instanceof ftp.FTPError ? error.code : undefined;
    Logger.debug(`FTP ${request.method} ${request.uri.href} failed${status ? ` (${status})` : ''}`);
    return new RemoteOperationError(`FTP ${request.method} failed: ${errorMessage(error)}`, status, error);
}
