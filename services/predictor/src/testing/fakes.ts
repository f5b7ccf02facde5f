import type { GameEvent, LoggerLike, TeamSide } from '@winline/shared';

export interface RecordedLog {
    level: 'debug' | 'info' | 'warn' | 'error';
    message: string;
    context: Record<string, unknown>;
}

/** Collects log lines in memory so tests can assert on them */
export class RecordingLogger implements LoggerLike {
    constructor(
        readonly entries: RecordedLog[] = [],
        private readonly bound: Record<string, unknown> = {}
    ) { }

    debug(message: string, context?: Record<string, unknown>): void {
        this.push('debug', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.push('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.push('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.push('error', message, context);
    }

    child(context: Record<string, unknown>): RecordingLogger {
        return new RecordingLogger(this.entries, { ...this.bound, ...context });
    }

    at(level: RecordedLog['level']): RecordedLog[] {
        return this.entries.filter((entry) => entry.level === level);
    }

    private push(level: RecordedLog['level'], message: string, context?: Record<string, unknown>): void {
        this.entries.push({ level, message, context: { ...this.bound, ...context } });
    }
}

export function gameEvent(
    type: string,
    team: TeamSide,
    time: number,
    extra: Partial<Omit<GameEvent, 'type' | 'team' | 'time'>> = {}
): GameEvent {
    return { type, team, time, context: 'default', ...extra };
}
