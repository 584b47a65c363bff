/**
 * Configuration types for connection profiles
 */

import { Protocol } from './connection';

export interface RemoteProfile {
    name?: string;
    protocol: Protocol;
    host: string;
    port?: number;
    username: string;
    password?: string;
    remotePath: string;
    secure: boolean;
    timeout: number;
    debug: boolean;
}

export const DEFAULT_CONFIG: Partial<RemoteProfile> = {
    protocol: 'sftp',
    username: '',
    remotePath: '',
    secure: false,
    timeout: 30000,
    debug: false
};

/**
 * Port used when a connection leaves it unset. FTPS here is explicit TLS on the FTP port.
 */
export function getDefaultPort(protocol: Protocol): number {
    return protocol === 'sftp' ? 22 : 21;
}

export function mergeWithDefaults(config: Partial<RemoteProfile>): RemoteProfile {
    const merged: RemoteProfile = {
        protocol: config.protocol ?? DEFAULT_CONFIG.protocol ?? 'sftp',
        host: config.host ?? '',
        username: config.username ?? DEFAULT_CONFIG.username ?? '',
        remotePath: config.remotePath ?? DEFAULT_CONFIG.remotePath ?? '',
        secure: config.secure ?? DEFAULT_CONFIG.secure ?? false,
        timeout: config.timeout ?? DEFAULT_CONFIG.timeout ?? 30000,
        debug: config.debug ?? DEFAULT_CONFIG.debug ?? false
    };

    if (config.name !== undefined) {
        merged.name = config.name;
    }
    if (config.password !== undefined) {
        merged.password = config.password;
    }
    // Left unset so the protocol default stays implicit
    if (config.port) {
        merged.port = config.port;
    }

    return merged;
}
