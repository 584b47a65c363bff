import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
    ConfigError,
    ConfigManager,
    TransferClient,
    buildFtpUri,
    getDefaultPort,
    mergeWithDefaults,
    openProfile,
    parseProfile,
    stripJsonComments,
    toConnection
} from '../index';

describe('stripJsonComments', () => {
    test('removes line and block comments', () => {
        const content = '{\n  // comment\n  "a": 1, /* inline */ "b": 2\n}';
        expect(JSON.parse(stripJsonComments(content))).toEqual({ a: 1, b: 2 });
    });

    test('leaves comment markers inside strings alone', () => {
        const content = '{ "url": "ftp://example.test/*path*/", "quote": "say \\"//hi\\"" }';
        expect(JSON.parse(stripJsonComments(content))).toEqual({
            url: 'ftp://example.test/*path*/',
            quote: 'say "//hi"'
        });
    });
});

describe('parseProfile', () => {
    test('requires a host', () => {
        expect(() => parseProfile({ protocol: 'ftp' }, 'test.json')).toThrow('test.json: "host" is required');
    });

    test('rejects values of the wrong kind', () => {
        expect(() => parseProfile([], 'test.json')).toThrow(ConfigError);
        expect(() => parseProfile({ host: 'example.test', protocol: 'scp' }, 'test.json')).toThrow(ConfigError);
        expect(() => parseProfile({ host: 'example.test', port: '21' }, 'test.json')).toThrow(ConfigError);
        expect(() => parseProfile({ host: 'example.test', timeout: 0 }, 'test.json')).toThrow(ConfigError);
        expect(() => parseProfile({ host: 'example.test', username: 7 }, 'test.json')).toThrow('test.json: "username" must be a string');
        expect(() => parseProfile({ host: 'example.test', secure: 'yes' }, 'test.json')).toThrow(ConfigError);
    });

    test('keeps only the keys that were set', () => {
        expect(parseProfile({ host: ' example.test ', protocol: 'ftp', secure: true }, 'test.json')).toEqual({
            host: 'example.test',
            protocol: 'ftp',
            secure: true
        });
    });
});

describe('mergeWithDefaults', () => {
    test('knows the default port of each protocol', () => {
        expect(getDefaultPort('ftp')).toBe(21);
        expect(getDefaultPort('sftp')).toBe(22);
    });

    test('leaves an unset port unset', () => {
        expect(mergeWithDefaults({ host: 'example.test', protocol: 'ftp' }).port).toBeUndefined();
        expect(mergeWithDefaults({ host: 'example.test', port: 0 }).port).toBeUndefined();
    });

    test('keeps an explicit port', () => {
        expect(mergeWithDefaults({ host: 'example.test', port: 2121 }).port).toBe(2121);
    });

    test('applies defaults to missing keys', () => {
        expect(mergeWithDefaults({ host: 'example.test' })).toEqual({
            protocol: 'sftp',
            host: 'example.test',
            username: '',
            remotePath: '',
            secure: false,
            timeout: 30000,
            debug: false
        });
    });
});

describe('ConfigManager', () => {
    let folder: string;
    let manager: ConfigManager;

    beforeEach(async () => {
        folder = await fs.mkdtemp(path.join(os.tmpdir(), 'config-manager-'));
        manager = new ConfigManager();
    });

    afterEach(async () => {
        await fs.rm(folder, { recursive: true, force: true });
    });

    test('creates a default profile that loads back', async () => {
        const configPath = await manager.createConfig(folder);

        expect(configPath).toBe(path.join(folder, '.remotefs', '.remotefs.json'));
        await expect(manager.requireConfig(folder)).resolves.toEqual({
            name: 'My Server',
            protocol: 'sftp',
            host: 'example.test',
            port: 22,
            username: 'username',
            password: '',
            remotePath: '/var/www',
            timeout: 30000,
            secure: false,
            debug: false
        });
        expect(manager.hasConfigs()).toBe(true);
        expect(manager.getConfig(folder)?.host).toBe('example.test');
    });

    test('does not overwrite an existing profile by default', async () => {
        const configPath = manager.getConfigPath(folder);
        await fs.mkdir(path.dirname(configPath), { recursive: true });
        await fs.writeFile(configPath, '{ "host": "kept.example.test" }');

        await manager.createConfig(folder);
        await expect(fs.readFile(configPath, 'utf-8')).resolves.toBe('{ "host": "kept.example.test" }');

        await manager.createConfig(folder, true);
        await expect(manager.requireConfig(folder)).resolves.toMatchObject({ host: 'example.test' });
    });

    test('reports a missing profile as null', async () => {
        await expect(manager.loadConfigForFolder(folder)).resolves.toBeNull();
        await expect(manager.requireConfig(folder)).rejects.toBeInstanceOf(ConfigError);
        expect(manager.hasConfigs()).toBe(false);
    });

    test('rejects a profile that is not JSON', async () => {
        const configPath = manager.getConfigPath(folder);
        await fs.mkdir(path.dirname(configPath), { recursive: true });
        await fs.writeFile(configPath, '{ "host": ');

        await expect(manager.requireConfig(folder)).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
    });

    test('turns a profile into a connection descriptor', () => {
        const conn = toConnection(mergeWithDefaults({
            host: 'example.test',
            protocol: 'ftp',
            username: 'tester',
            password: 'test-secret',
            remotePath: '/pub'
        }));

        expect(conn.protocol).toBe('ftp');
        expect(conn.port).toBeUndefined();
        expect(conn.workingPath).toBe('/pub');
        expect(conn.password).toBe('test-secret');
    });

    test('keeps the port out of addresses when the profile does not set one', () => {
        const conn = toConnection(mergeWithDefaults({ host: 'example.test', protocol: 'ftp', remotePath: '/pub' }));

        expect(buildFtpUri(conn, 'a.txt').href).toBe('ftp://example.test/pub/a.txt');
        expect(conn.toString()).toBe('ftp://example.test/pub');
    });

    test('opens a client and connection from a project folder', async () => {
        await manager.createConfig(folder);

        const { client, connection } = await openProfile(folder);

        expect(client).toBeInstanceOf(TransferClient);
        expect(connection.toString()).toBe('sftp://username@example.test:22/var/www');
    });
});
