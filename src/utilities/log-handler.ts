import { LogManager, LogType } from './log-manager';

/**
 * Logger for one module. All handlers feed the same LogManager.
 *
 *   const log = new LogHandler('UseViewport');
 *   log.debug({ viewport: 'overview', padding });
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(private readonly source: string) {}

    public error(msg: string, exception?: Error): void {
        this.push(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.push(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.push(LogType.Info, msg);
    }

    /** Objects are dumped as-is. Dropped unless debug output is enabled. */
    public debug(msg: string | object): void {
        this.push(LogType.Debug, msg);
    }

    private push(type: LogType, msg: string | object, exception?: Error): void {
        LogHandler.manager.push({ type, source: this.source, msg, exception });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }

    public static setDebugEnabled(enabled: boolean): void {
        this.manager.debugEnabled = enabled;
    }
}
