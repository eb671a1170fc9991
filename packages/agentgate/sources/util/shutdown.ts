import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;

export type ShutdownReason = NodeJS.Signals | "fatal";

const FORCE_EXIT_MS = 5000;
const logger = getLogger("shutdown");
const shutdownHandlers = new Map<string, ShutdownHandler[]>();

let shutdownPromise: Promise<ShutdownReason> | null = null;
let resolveShutdown: ((reason: ShutdownReason) => void) | null = null;
let requestedReason: ShutdownReason | null = null;
let shutdownCompletion: Promise<void> | null = null;
let handlersAttached = false;

export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    const handlers = shutdownHandlers.get(name) ?? [];
    handlers.push(handler);
    shutdownHandlers.set(name, handlers);

    return () => {
        const list = shutdownHandlers.get(name);
        if (!list) {
            return;
        }
        const index = list.indexOf(handler);
        if (index !== -1) {
            list.splice(index, 1);
        }
        if (list.length === 0) {
            shutdownHandlers.delete(name);
        }
    };
}

/**
 * Resolves with the signal once SIGINT/SIGTERM arrives and every registered handler has settled.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (!shutdownPromise) {
        shutdownPromise = new Promise((resolve) => {
            resolveShutdown = resolve;
            if (!handlersAttached) {
                handlersAttached = true;
                const handler = (signal: NodeJS.Signals) => {
                    requestShutdown(signal);
                };
                process.once("SIGINT", handler);
                process.once("SIGTERM", handler);
            }
            if (requestedReason) {
                resolveWhenComplete(requestedReason);
            }
        });
    }
    return shutdownPromise;
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (requestedReason) {
        return;
    }
    requestedReason = reason;
    shutdownCompletion = shutdownRun(reason);
    resolveWhenComplete(reason);
}

function resolveWhenComplete(reason: ShutdownReason): void {
    const resolve = resolveShutdown;
    if (!resolve) {
        return;
    }
    void (shutdownCompletion ?? Promise.resolve()).then(() => resolve(reason));
}

async function shutdownRun(reason: ShutdownReason): Promise<void> {
    const forceExit = setTimeout(() => {
        logger.warn(`event: Shutdown: forcing exit after ${FORCE_EXIT_MS}ms`);
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const tasks: Promise<void>[] = [];
    for (const [name, handlers] of shutdownHandlers) {
        handlers.forEach((handler, index) => {
            tasks.push(
                Promise.resolve()
                    .then(() => handler())
                    .catch((error: unknown) => {
                        logger.warn({ error }, `event: Shutdown: handler ${name}[${index + 1}] failed`);
                    })
            );
        });
    }
    logger.info({ reason, handlers: tasks.length }, "event: Shutdown: running handlers");

    await Promise.allSettled(tasks);
    clearTimeout(forceExit);
}
