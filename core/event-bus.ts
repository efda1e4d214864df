import { EventEmitter } from 'events';

export interface ProgressData {
    current: number;
    target?: number;
    action: string;
}

export interface StatusData {
    message: string;
    timestamp: Date;
}

export interface LogMessageData {
    message: string;
    level: string;
    timestamp: Date;
}

export interface StateTransitionData {
    from: string | null;
    to: string;
}

export interface EmptyPagePromptData {
    consecutiveEmptyPages: number;
    totalEmptyPages: number;
    count: number;
    oldestDate?: string;
}

export interface BackoffData {
    operation: string;
    failureClass: string;
    attempt: number;
    delaySeconds: number;
    message: string;
}

export interface SessionCompleteData {
    mode: string;
    count: number;
    outputPath: string;
    stopReason: string;
}

export class SessionEventBus extends EventEmitter {
    public readonly events = {
        PROGRESS: 'session:progress',
        STATUS: 'session:status',
        LOG_MESSAGE: 'log:message',
        STATE: 'engine:state',
        PROMPT: 'engine:prompt',
        BACKOFF: 'retry:backoff',
        CREDENTIALS_EXPIRED: 'auth:expired',
        NETWORK_DEGRADED: 'network:degraded',
        COMPLETE: 'session:complete',
    } as const;

    emitProgress(data: ProgressData): void {
        this.emit(this.events.PROGRESS, data);
    }

    emitStatus(message: string): void {
        this.emit(this.events.STATUS, { message, timestamp: new Date() });
    }

    emitLog(message: string, level: string = 'info'): void {
        this.emit(this.events.LOG_MESSAGE, { message, level, timestamp: new Date() });
    }

    emitState(data: StateTransitionData): void {
        this.emit(this.events.STATE, data);
    }

    emitPrompt(data: EmptyPagePromptData): void {
        this.emit(this.events.PROMPT, data);
    }

    emitBackoff(data: BackoffData): void {
        this.emit(this.events.BACKOFF, data);
    }

    emitCredentialsExpired(message: string): void {
        this.emit(this.events.CREDENTIALS_EXPIRED, { message, timestamp: new Date() });
    }

    emitNetworkDegraded(message: string): void {
        this.emit(this.events.NETWORK_DEGRADED, { message, timestamp: new Date() });
    }

    emitComplete(data: SessionCompleteData): void {
        this.emit(this.events.COMPLETE, data);
    }
}

export function createEventBus(): SessionEventBus {
    return new SessionEventBus();
}
