export { TransferClient, TransferClientOptions } from './transferClient';
export { FtpFileService, appendToUri } from './ftpFileService';
export { ConfigManager, toConnection, toClientOptions, parseProfile, stripJsonComments } from './configManager';
