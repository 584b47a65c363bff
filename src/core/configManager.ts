import * as fs from 'fs/promises';
import * as path from 'path';
import {
    ConfigError,
    ConnectionDescriptor,
    RemoteProfile,
    errorMessage,
    isProtocol,
    mergeWithDefaults
} from '../types';
import { Logger } from '../utils';
import { TransferClientOptions } from './transferClient';

const CONFIG_FILENAME = '.remotefs.json';
const CONFIG_DIR = '.remotefs';

const DEFAULT_CONFIG_TEMPLATE = `{
    // Display name for this connection
    "name": "My Server",

    // "ftp" or "sftp"
    "protocol": "sftp",

    "host": "example.test",

    // Optional; defaults to 21 for FTP, 22 for SFTP
    "port": 22,

    "username": "username",
    "password": "",

    // Remote working directory; operations take names relative to it
    "remotePath": "/var/www",

    // Connection timeout in milliseconds
    "timeout": 30000,

    // Explicit FTP over TLS (ftp only)
    "secure": false,

    "debug": false
}
`;

/**
 * Loads connection profiles from `.remotefs/.remotefs.json` in project folders
 */
export class ConfigManager {
    private configs: Map<string, RemoteProfile> = new Map();

    /**
     * Get the config file path for a folder
     */
    public getConfigPath(folderPath: string): string {
        return path.join(folderPath, CONFIG_DIR, CONFIG_FILENAME);
    }

    /**
     * Load config for a specific folder. Problems are logged and reported as null.
     */
    public async loadConfigForFolder(folderPath: string): Promise<RemoteProfile | null> {
        try {
            return await this.requireConfig(folderPath);
        } catch (error) {
            Logger.error(`Failed to load config for ${folderPath}: ${errorMessage(error)}`);
            return null;
        }
    }

    /**
     * Load config for a folder, throwing ConfigError when it is missing or invalid
     */
    public async requireConfig(folderPath: string): Promise<RemoteProfile> {
        const configPath = this.getConfigPath(folderPath);

        let content: string;
        try {
            content = await fs.readFile(configPath, 'utf-8');
        } catch (error) {
            throw new ConfigError(`Unable to read ${configPath}: ${errorMessage(error)}`);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(stripJsonComments(content));
        } catch (error) {
            throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(error)}`);
        }

        const config = mergeWithDefaults(parseProfile(raw, configPath));
        this.configs.set(folderPath, config);
        Logger.info(`Loaded configuration from ${configPath}`);

        return config;
    }

    /**
     * Get config for a specific folder
     */
    public getConfig(folderPath: string): RemoteProfile | undefined {
        return this.configs.get(folderPath);
    }

    /**
     * Check if any config is loaded
     */
    public hasConfigs(): boolean {
        return this.configs.size > 0;
    }

    /**
     * Write a commented default config file. An existing file is kept unless `overwrite` is set.
     * Returns the config file path.
     */
    public async createConfig(folderPath: string, overwrite = false): Promise<string> {
        const configPath = this.getConfigPath(folderPath);
        await fs.mkdir(path.dirname(configPath), { recursive: true });

        try {
            await fs.writeFile(configPath, DEFAULT_CONFIG_TEMPLATE, { encoding: 'utf-8', flag: overwrite ? 'w' : 'wx' });
            Logger.info(`Created config file at ${configPath}`);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
                Logger.warn(`Config file already exists at ${configPath}`);
            } else {
                throw new ConfigError(`Unable to write ${configPath}: ${errorMessage(error)}`);
            }
        }

        return configPath;
    }
}

/**
 * Connection descriptor for a profile
 */
export function toConnection(profile: RemoteProfile): ConnectionDescriptor {
    return new ConnectionDescriptor({
        host: profile.host,
        port: profile.port,
        username: profile.username,
        password: profile.password ?? '',
        protocol: profile.protocol,
        workingPath: profile.remotePath
    });
}

/**
 * Client options for a profile
 */
export function toClientOptions(profile: RemoteProfile): TransferClientOptions {
    return {
        timeout: profile.timeout,
        secure: profile.secure,
        debug: profile.debug
    };
}

/**
 * Check the shape of a parsed config file
 */
export function parseProfile(raw: unknown, source: string): Partial<RemoteProfile> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigError(`${source}: expected an object`);
    }

    const entries = new Map<string, unknown>(Object.entries(raw));
    const profile: Partial<RemoteProfile> = {};

    const host = entries.get('host');
    if (typeof host !== 'string' || host.trim() === '') {
        throw new ConfigError(`${source}: "host" is required`);
    }
    profile.host = host.trim();

    const protocol = entries.get('protocol');
    if (protocol !== undefined) {
        if (!isProtocol(protocol)) {
            throw new ConfigError(`${source}: "protocol" must be "ftp" or "sftp"`);
        }
        profile.protocol = protocol;
    }

    const port = entries.get('port');
    if (port !== undefined) {
        if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
            throw new ConfigError(`${source}: "port" must be an integer between 0 and 65535`);
        }
        profile.port = port;
    }

    const timeout = entries.get('timeout');
    if (timeout !== undefined) {
        if (typeof timeout !== 'number' || timeout <= 0) {
            throw new ConfigError(`${source}: "timeout" must be a positive number`);
        }
        profile.timeout = timeout;
    }

    for (const key of ['name', 'username', 'password', 'remotePath'] as const) {
        const value = entries.get(key);
        if (value === undefined) {
            continue;
        }
        if (typeof value !== 'string') {
            throw new ConfigError(`${source}: "${key}" must be a string`);
        }
        profile[key] = value;
    }

    for (const key of ['secure', 'debug'] as const) {
        const value = entries.get(key);
        if (value === undefined) {
            continue;
        }
        if (typeof value !== 'boolean') {
            throw new ConfigError(`${source}: "${key}" must be true or false`);
        }
        profile[key] = value;
    }

    return profile;
}

/**
 * Strip comments from JSONC content.
 * Supports single-line (//) and multi-line comments; string contents are left alone.
 */
export function stripJsonComments(content: string): string {
    let result = '';
    let i = 0;

    while (i < content.length) {
        const char = content[i];
        const next = content[i + 1];

        if (char === '"') {
            // Copy the whole string literal, honouring escapes
            let end = i + 1;
            while (end < content.length && content[end] !== '"') {
                end += content[end] === '\\' ? 2 : 1;
            }
            result += content.slice(i, end + 1);
            i = end + 1;
        } else if (char === '/' && next === '/') {
            const newline = content.indexOf('\n', i);
            i = newline === -1 ? content.length : newline;
        } else if (char === '/' && next === '*') {
            const close = content.indexOf('*/', i + 2);
            i = close === -1 ? content.length : close + 2;
        } else {
            result += char;
            i++;
        }
    }

    return result;
}
