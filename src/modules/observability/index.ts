import winston from 'winston';
import 'winston-daily-rotate-file';
import { Outcome, ProbeResult } from '../../types';

export type LogMeta = Record<string, unknown>;

export class Logger {
    private logger: winston.Logger;

    constructor(env: NodeJS.ProcessEnv = process.env) {
        const silent = env.NODE_ENV === 'test';
        const transports: winston.transport[] = [
            new winston.transports.Console({ format: winston.format.simple() }),
        ];

        if (!silent) {
            transports.push(new winston.transports.DailyRotateFile({
                dirname: env.LOG_DIR || 'logs',
                filename: 'domain-prober-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d'
            }));
        }

        this.logger = winston.createLogger({
            level: env.LOG_LEVEL || 'info',
            silent,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports
        });
    }

    log(level: string, message: string, meta?: LogMeta) {
        this.logger.log(level, message, meta);
    }

    info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: LogMeta) {
        this.log('error', message, meta);
    }

    debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }
}

export const logger = new Logger();

export type MetricsSnapshot = {
    probed: number;
    live: number;
    parked: number;
    empty: number;
    error: number;
    skipped: number;
    avg_latency: number;
};

export class Metrics {
    private stats = {
        probed: 0,
        live: 0,
        parked: 0,
        empty: 0,
        error: 0,
        skipped: 0,
        total_latency: 0
    };

    record(result: ProbeResult) {
        this.stats.probed++;
        this.stats.total_latency += result.latencyMs;
        switch (result.classification.outcome) {
            case Outcome.LIVE: this.stats.live++; break;
            case Outcome.PARKED: this.stats.parked++; break;
            case Outcome.EMPTY: this.stats.empty++; break;
            case Outcome.ERROR: this.stats.error++; break;
        }
    }

    recordSkip() {
        this.stats.skipped++;
    }

    getSummary(): MetricsSnapshot {
        const { total_latency, ...counts } = this.stats;
        return {
            ...counts,
            avg_latency: counts.probed > 0 ? Math.round(total_latency / counts.probed) : 0
        };
    }
}

export interface HeartbeatOptions {
    intervalMs: number;
    memoryWarnMb: number;
    snapshot: () => MetricsSnapshot;
    log?: Logger;
}

/**
 * Periodic progress and heap report. Reads counters only; the stores stay
 * owned by the executor.
 */
export class Heartbeat {
    private timer: NodeJS.Timeout | null = null;

    constructor(private options: HeartbeatOptions) {}

    start() {
        if (this.timer || this.options.intervalMs <= 0) return;
        this.timer = setInterval(() => this.beat(), this.options.intervalMs);
        this.timer.unref();
    }

    beat() {
        const log = this.options.log ?? logger;
        const usedMb = Math.round(process.memoryUsage().heapUsed / 1024 / 1024);
        log.info('Scan progress', { ...this.options.snapshot(), heap_mb: usedMb });
        if (usedMb > this.options.memoryWarnMb) {
            log.warn(`Heap usage high (${usedMb}MB)`, { heap_mb: usedMb });
        }
    }

    stop() {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }
}
