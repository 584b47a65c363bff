import { InvalidArgumentError, Protocol } from '../types';
import { RemoteClient, RemoteClientOptions } from './remoteClient';
import { FtpClient } from './ftpClient';
import { SftpClientWrapper } from './sftpClient';

export { RemoteClient, RemoteClientOptions, DEFAULT_CLIENT_OPTIONS } from './remoteClient';
export {
    FtpClient,
    buildFtpUri,
    classifyProbeFailure,
    PROBE_FAILURE_PATH_TYPES,
    PROBE_SUCCESS_PATH_TYPE,
    PROBE_FALLBACK_PATH_TYPE
} from './ftpClient';
export { SftpClientWrapper, SftpSession, SftpSessionFactory } from './sftpClient';
export * from './ftpTransport';

export type DriverMap = Record<Protocol, RemoteClient>;

/**
 * Factory function to create the appropriate client based on protocol
 */
export function createClient(protocol: Protocol, options: Partial<RemoteClientOptions> = {}): RemoteClient {
    switch (protocol) {
        case 'ftp':
            return new FtpClient(options);
        case 'sftp':
            return new SftpClientWrapper(options);
        default:
            throw new InvalidArgumentError('protocol', `Unsupported protocol: ${String(protocol)}`);
    }
}

/**
 * One driver per protocol, sharing the same options
 */
export function createDrivers(options: Partial<RemoteClientOptions> = {}): DriverMap {
    return {
        ftp: createClient('ftp', options),
        sftp: createClient('sftp', options)
    };
}
