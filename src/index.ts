import { ConfigManager, TransferClient, toClientOptions, toConnection } from './core';
import { ConnectionDescriptor } from './types';

export * from './types';
export * from './clients';
export * from './core';
export { Logger } from './utils';

/**
 * Load the profile of a project folder and build a client and descriptor for it
 */
export async function openProfile(folderPath: string): Promise<{ client: TransferClient; connection: ConnectionDescriptor }> {
    const profile = await new ConfigManager().requireConfig(folderPath);
    return {
        client: new TransferClient(toClientOptions(profile)),
        connection: toConnection(profile)
    };
}
