import { afterEach, describe, expect, it, vi } from "vitest";

describe("shutdown", () => {
    afterEach(() => {
        vi.resetModules();
    });

    it("runs registered handlers before awaitShutdown resolves", async () => {
        const { awaitShutdown, onShutdown, requestShutdown } = await import("./shutdown.js");
        const order: string[] = [];
        onShutdown("connector", async () => {
            order.push("connector");
        });
        const waiting = awaitShutdown().then((reason) => {
            order.push(`resolved:${reason}`);
            return reason;
        });

        requestShutdown("SIGINT");

        await expect(waiting).resolves.toBe("SIGINT");
        expect(order).toEqual(["connector", "resolved:SIGINT"]);
    });

    it("keeps going when a handler fails", async () => {
        const { awaitShutdown, onShutdown, requestShutdown } = await import("./shutdown.js");
        const second = vi.fn();
        onShutdown("first", () => {
            throw new Error("boom");
        });
        onShutdown("second", second);

        requestShutdown("SIGTERM");

        await expect(awaitShutdown()).resolves.toBe("SIGTERM");
        expect(second).toHaveBeenCalledTimes(1);
    });

    it("skips handlers that were unregistered", async () => {
        const { awaitShutdown, onShutdown, requestShutdown } = await import("./shutdown.js");
        const handler = vi.fn();
        const unregister = onShutdown("connector", handler);
        unregister();

        requestShutdown();

        await expect(awaitShutdown()).resolves.toBe("SIGTERM");
        expect(handler).not.toHaveBeenCalled();
    });
});
