import { describe, expect, it } from "vitest";

import { AgentSessionStore } from "./agentSessionStore.js";

describe("AgentSessionStore", () => {
    it("returns the last session recorded for a conversation", () => {
        const store = new AgentSessionStore();

        expect(store.get(1)).toBeUndefined();
        store.set(1, "s1");
        store.set(1, "s2");
        store.set(2, "other");

        expect(store.get(1)).toBe("s2");
        expect(store.get(2)).toBe("other");
    });
});
