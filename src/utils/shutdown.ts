import type { StartupReporter } from "../services/startup-info";

export interface ShutdownTarget {
    once(event: NodeJS.Signals, listener: () => void): unknown;
    removeListener(event: NodeJS.Signals, listener: () => void): unknown;
    exit(code?: number): void;
}

export interface ShutdownHookOptions {
    reporter: StartupReporter;
    application: { stop?(): void | Promise<void> };
    logger: { error(message: string): void };
    signals?: NodeJS.Signals[];
    target?: ShutdownTarget;
}

const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// Returns a function that removes the listeners again
export function installShutdownHooks(options: ShutdownHookOptions): () => void {
    const target: ShutdownTarget = options.target ?? process;
    const signals = options.signals ?? DEFAULT_SIGNALS;
    const listeners = new Map<NodeJS.Signals, () => void>();

    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        options.reporter.logStopping(signal);
        await options.application.stop?.();
    };

    const dispose = () => {
        for (const [signal, listener] of listeners) {
            target.removeListener(signal, listener);
        }
        listeners.clear();
    };

    for (const signal of signals) {
        const listener = () => {
            // First signal wins; a second one during a slow stop() is ignored
            dispose();
            shutdown(signal).then(
                () => target.exit(0),
                (err: unknown) => {
                    options.logger.error(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
                    target.exit(1);
                }
            );
        };
        listeners.set(signal, listener);
        target.once(signal, listener);
    }

    return dispose;
}
