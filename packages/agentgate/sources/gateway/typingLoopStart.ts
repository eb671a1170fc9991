import { getLogger } from "../log.js";

const logger = getLogger("gateway.typing");

export const TYPING_INTERVAL_MS = 4000;

export type TypingLoop = {
    stop(): Promise<void>;
};

/**
 * Repeats a typing indicator until stopped.
 * Expects: send failures are logged and do not end the loop.
 */
export function typingLoopStart(send: () => Promise<void>, intervalMs = TYPING_INTERVAL_MS): TypingLoop {
    const controller = new AbortController();

    const run = async (): Promise<void> => {
        while (!controller.signal.aborted) {
            try {
                await send();
            } catch (error) {
                logger.debug({ error }, "error: Typing indicator failed");
            }
            await delayUntilAborted(intervalMs, controller.signal);
        }
    };
    const task = run();

    return {
        stop: async () => {
            controller.abort();
            await task;
        }
    };
}

function delayUntilAborted(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const done = (): void => {
            clearTimeout(timer);
            signal.removeEventListener("abort", done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal.addEventListener("abort", done, { once: true });
    });
}
