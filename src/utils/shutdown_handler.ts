import { Logger, logger as defaultLogger } from '../modules/observability';

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * First signal: stop submitting probes and let the run drain and flush.
 * Second signal: exit at once; uncommitted probes are redone next run.
 */
export class ShutdownHandler {

    static install(controller: AbortController, log: Logger = defaultLogger): () => void {
        const onSignal = (signal: NodeJS.Signals) => {
            if (!controller.signal.aborted) {
                log.warn(`[Shutdown] Received ${signal}. Finishing in-flight probes; send again to exit now.`);
                controller.abort();
                return;
            }
            log.warn(`[Shutdown] Received ${signal} again. Exiting without draining.`);
            process.exit(130);
        };

        for (const signal of SIGNALS) process.on(signal, onSignal);
        return () => {
            for (const signal of SIGNALS) process.off(signal, onSignal);
        };
    }
}
