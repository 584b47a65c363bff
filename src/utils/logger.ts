/**
 * Logger utility for the transfer client
 */
export class Logger {
    private static output: NodeJS.WritableStream | undefined;
    private static debugMode = false;

    /**
     * Send log lines to the given stream
     */
    public static init(output: NodeJS.WritableStream): void {
        this.output = output;
    }

    public static setDebugMode(enabled: boolean): void {
        this.debugMode = enabled;
    }

    public static info(message: string): void {
        this.log('INFO', message);
    }

    public static warn(message: string): void {
        this.log('WARN', message);
    }

    public static error(message: string): void {
        this.log('ERROR', message);
    }

    public static debug(message: string): void {
        if (this.debugMode) {
            this.log('DEBUG', message);
        }
    }

    public static success(message: string): void {
        this.log('SUCCESS', message);
    }

    private static log(level: string, message: string): void {
        const timestamp = new Date().toISOString();
        const formattedMessage = `[${timestamp}] [${level}] ${message}`;

        if (this.output) {
            this.output.write(formattedMessage + '\n');
        } else if (level === 'ERROR') {
            console.error(formattedMessage);
        }
    }
}
