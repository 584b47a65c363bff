import { inspect } from 'util';
import { InvalidArgumentError } from './errors';

const REDACTED = '[secret]';

/**
 * Opaque holder for a password. The bytes live in a private buffer copy and
 * only leave it through `reveal()`.
 */
export class SecureSecret {
    private readonly bytes: Buffer;
    private disposed = false;

    constructor(value: string | Buffer | SecureSecret) {
        if (value instanceof SecureSecret) {
            this.bytes = Buffer.from(value.bytes);
            this.disposed = value.disposed;
        } else if (typeof value === 'string') {
            this.bytes = Buffer.from(value, 'utf8');
        } else {
            this.bytes = Buffer.from(value);
        }
    }

    get length(): number {
        return this.bytes.length;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    /**
     * Plaintext form, for protocols that need the password itself
     */
    reveal(): string {
        if (this.disposed) {
            throw new InvalidArgumentError('secret', 'Secret has been disposed');
        }
        return this.bytes.toString('utf8');
    }

    /**
     * Zero the backing buffer. The secret cannot be revealed afterwards.
     */
    dispose(): void {
        this.bytes.fill(0);
        this.disposed = true;
    }

    toString(): string {
        return REDACTED;
    }

    toJSON(): string {
        return REDACTED;
    }

    [inspect.custom](): string {
        return REDACTED;
    }
}
