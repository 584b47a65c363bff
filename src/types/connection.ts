import { InvalidArgumentError } from './errors';
import { SecureSecret } from './secret';

export type Protocol = 'ftp' | 'sftp';

export const PROTOCOLS: readonly Protocol[] = ['ftp', 'sftp'];

/**
 * Remote path classification. Always derived on demand, never stored.
 */
export type PathType = 'file' | 'directory';

export interface ConnectionOptions {
    host: string;
    port?: number;
    username: string;
    password: string | Buffer | SecureSecret;
    protocol?: Protocol;
    workingPath?: string;
}

export function isProtocol(value: unknown): value is Protocol {
    return typeof value === 'string' && (PROTOCOLS as readonly string[]).includes(value);
}

/**
 * Identifies a remote endpoint, its credentials and the protocol to reach it with.
 * Everything but `workingPath` is fixed at construction.
 */
export class ConnectionDescriptor {
    readonly host: string;
    readonly port?: number;
    readonly username: string;
    readonly protocol: Protocol;
    workingPath: string;

    private readonly secret: SecureSecret;

    constructor(options: ConnectionOptions) {
        if (!options.host) {
            throw new InvalidArgumentError('host');
        }
        if (options.port !== undefined && (!Number.isInteger(options.port) || options.port < 0 || options.port > 65535)) {
            throw new InvalidArgumentError('port', `Invalid port: ${options.port}`);
        }

        const protocol = options.protocol ?? 'ftp';
        if (!isProtocol(protocol)) {
            throw new InvalidArgumentError('protocol', `Unsupported protocol: ${String(protocol)}`);
        }

        this.host = options.host;
        this.port = options.port;
        this.username = options.username ?? '';
        this.protocol = protocol;
        this.workingPath = options.workingPath ?? '';
        this.secret = new SecureSecret(options.password ?? '');
    }

    /**
     * Plaintext password
     */
    get password(): string {
        return this.secret.reveal();
    }

    /**
     * Opaque password handle
     */
    get securePassword(): SecureSecret {
        return this.secret;
    }

    /**
     * Port to put on the wire, or undefined when the protocol default applies
     */
    get explicitPort(): number | undefined {
        return this.port ? this.port : undefined;
    }

    toString(): string {
        const port = this.explicitPort ? `:${this.explicitPort}` : '';
        return `${this.protocol}://${this.username ? this.username + '@' : ''}${this.host}${port}/${this.workingPath.replace(/^\/+/, '')}`;
    }
}
