import { afterEach, describe, expect, it, vi } from "vitest";

import { typingLoopStart } from "./typingLoopStart.js";

describe("typingLoopStart", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("sends immediately and then on every interval until stopped", async () => {
        vi.useFakeTimers();
        const send = vi.fn(async () => undefined);

        const loop = typingLoopStart(send, 4000);
        await vi.advanceTimersByTimeAsync(0);
        expect(send).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(4000);
        expect(send).toHaveBeenCalledTimes(2);

        await vi.advanceTimersByTimeAsync(8000);
        expect(send).toHaveBeenCalledTimes(4);

        await loop.stop();
        await vi.advanceTimersByTimeAsync(8000);
        expect(send).toHaveBeenCalledTimes(4);
    });

    it("keeps running when a send fails", async () => {
        vi.useFakeTimers();
        const send = vi.fn(async () => {
            throw new Error("rate limited");
        });

        const loop = typingLoopStart(send, 1000);
        await vi.advanceTimersByTimeAsync(2000);
        await loop.stop();

        expect(send).toHaveBeenCalledTimes(3);
    });

    it("stops without waiting for the pending interval", async () => {
        const send = vi.fn(async () => undefined);
        const loop = typingLoopStart(send, 60_000);
        const startedAt = Date.now();

        await loop.stop();

        expect(Date.now() - startedAt).toBeLessThan(1000);
        expect(send).toHaveBeenCalledTimes(1);
    });
});
