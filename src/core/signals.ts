export const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;
export type TerminationSignal = typeof TERMINATION_SIGNALS[number];

/** The part of `process` the handlers attach to */
export interface SignalSource {
    on(signal: TerminationSignal, listener: () => void): unknown;
    off(signal: TerminationSignal, listener: () => void): unknown;
}

/**
 * Route the termination signals to one handler. Only the first signal is
 * delivered; later ones are swallowed while the handler winds down.
 * Returns a function that removes the listeners.
 */
export const onTermination = (
    handler: (signal: TerminationSignal) => void,
    target: SignalSource = process,
): (() => void) => {
    let fired = false;
    const listeners = TERMINATION_SIGNALS.map(signal => {
        const listener = () => {
            if (fired) return;
            fired = true;
            handler(signal);
        };
        target.on(signal, listener);
        return { signal, listener };
    });

    return () => {
        for (const { signal, listener } of listeners) target.off(signal, listener);
    };
};
