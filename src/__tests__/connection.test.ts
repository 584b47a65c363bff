import { inspect } from 'util';
import { ConnectionDescriptor, ConnectionOptions, InvalidArgumentError, SecureSecret } from '../index';

const baseOptions: ConnectionOptions = {
    host: 'example.test',
    username: 'tester',
    password: 'test-secret'
};

describe('ConnectionDescriptor', () => {
    test('defaults to FTP with an empty working path and no port', () => {
        const conn = new ConnectionDescriptor(baseOptions);

        expect(conn.protocol).toBe('ftp');
        expect(conn.workingPath).toBe('');
        expect(conn.port).toBeUndefined();
        expect(conn.explicitPort).toBeUndefined();
    });

    test('treats port 0 as the protocol default', () => {
        const conn = new ConnectionDescriptor({ ...baseOptions, port: 0 });

        expect(conn.port).toBe(0);
        expect(conn.explicitPort).toBeUndefined();
    });

    test('requires a host', () => {
        expect(() => new ConnectionDescriptor({ ...baseOptions, host: '' })).toThrow(InvalidArgumentError);
    });

    test('rejects ports outside the TCP range', () => {
        expect(() => new ConnectionDescriptor({ ...baseOptions, port: 70000 })).toThrow(InvalidArgumentError);
        expect(() => new ConnectionDescriptor({ ...baseOptions, port: 21.5 })).toThrow(InvalidArgumentError);
    });

    test('rejects unknown protocols', () => {
        const options = Object.assign({ ...baseOptions }, { protocol: 'scp' });
        expect(() => new ConnectionDescriptor(options)).toThrow('Unsupported protocol: scp');
    });

    test('exposes the password in plaintext and as an opaque handle', () => {
        const conn = new ConnectionDescriptor(baseOptions);

        expect(conn.password).toBe('test-secret');
        expect(conn.securePassword).toBeInstanceOf(SecureSecret);
        expect(conn.securePassword.reveal()).toBe('test-secret');
    });

    test('copies a buffer secret', () => {
        const bytes = Buffer.from('test-secret');
        const conn = new ConnectionDescriptor({ ...baseOptions, password: bytes });
        bytes.fill(0);

        expect(conn.password).toBe('test-secret');
    });

    test('does not leak the secret through serialisation', () => {
        const conn = new ConnectionDescriptor(baseOptions);

        expect(JSON.parse(JSON.stringify(conn)).secret).toBe('[secret]');
        expect(inspect(conn)).not.toContain('test-secret');
    });

    test('lets the working path change between operations', () => {
        const conn = new ConnectionDescriptor({ ...baseOptions, workingPath: 'pub' });
        conn.workingPath = 'incoming';

        expect(conn.workingPath).toBe('incoming');
    });

    test('renders a credential-free address', () => {
        const conn = new ConnectionDescriptor({ ...baseOptions, protocol: 'sftp', port: 2222, workingPath: '/srv' });

        expect(conn.toString()).toBe('sftp://tester@example.test:2222/srv');
    });
});

describe('SecureSecret', () => {
    test('redacts every string form', () => {
        const secret = new SecureSecret('test-secret');

        expect(String(secret)).toBe('[secret]');
        expect(JSON.stringify({ secret })).toBe('{"secret":"[secret]"}');
        expect(inspect(secret)).toBe('[secret]');
        expect(secret.length).toBe(11);
    });

    test('zeroes and locks the secret on dispose', () => {
        const secret = new SecureSecret('test-secret');
        secret.dispose();

        expect(secret.isDisposed).toBe(true);
        expect(() => secret.reveal()).toThrow(InvalidArgumentError);
    });

    test('copies from another secret', () => {
        const original = new SecureSecret('test-secret');
        const copy = new SecureSecret(original);
        original.dispose();

        expect(copy.reveal()).toBe('test-secret');
    });
});
