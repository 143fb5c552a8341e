export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string | object;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY_SIZE = 100;

export class LogManager {
    public log: ILogMessage[] = [];
    /** Debug messages are dropped unless enabled (see viewport settings) */
    public debugEnabled = false;
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;

    /** Throttle state: source+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Forget history and throttle state */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        if (msg.type === LogType.Debug && !this.debugEnabled) {
            return;
        }

        msg.index = this.logMsgCount++;
        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        this.listener?.(msg);

        const text = textOf(msg.msg);
        const suppressed = this.throttle(`${msg.source}:${msg.type}:${text}`);
        if (suppressed === null) {
            return;
        }

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        writeToConsole(msg.type, format(msg, suppressed));
    }

    /**
     * Record one occurrence of `key`.
     * Returns null while it is throttled, otherwise how many copies were dropped since the last write.
     */
    private throttle(key: string): number | null {
        const now = performance.now();
        const state = this.throttleState.get(key);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return null;
        }

        this.throttleState.set(key, { lastTime: now, suppressedCount: 0 });
        return state?.suppressedCount ?? 0;
    }
}

/** Text form of a message, used as throttle key; payloads JSON cannot encode fall back to String() */
function textOf(payload: string | object): string {
    if (typeof payload === 'string') {
        return payload;
    }
    try {
        return JSON.stringify(payload);
    } catch {
        return String(payload);
    }
}

function format(msg: ILogMessage, suppressed: number): string {
    let formatted = `${msg.source}\t${String(msg.msg)}`;
    if (suppressed > 0) {
        formatted += ` (${suppressed} similar suppressed)`;
    }
    if (msg.exception) {
        formatted += '\n' + msg.exception.message;
        if (msg.exception.stack) {
            formatted += '\n' + msg.exception.stack;
        }
    }
    return formatted;
}

function writeToConsole(type: LogType, text: string): void {
    switch (type) {
    case LogType.Error:
        console.error(text);
        break;
    case LogType.Warn:
        console.warn(text);
        break;
    case LogType.Info:
        console.info(text);
        break;
    case LogType.Debug:
        console.log(text);
        break;
    }
}
