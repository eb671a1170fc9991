import { describe, expect, it } from "vitest";

import { allowedEntriesResolve, allowedUsernameExtract } from "./allowedEntriesResolve.js";

describe("allowedEntriesResolve", () => {
    it("sorts entries into ids, usernames and unresolved values", () => {
        const allowed = allowedEntriesResolve(" 42, -1001234 ,@Alice,https://t.me/OpsChat, t.me/+invite, t.me/c/55,, ");

        expect([...allowed.userIds]).toEqual([42, -1001234]);
        expect([...allowed.chatIds]).toEqual([42, -1001234]);
        expect([...allowed.usernames]).toEqual(["alice", "opschat"]);
        expect([...allowed.chatUsernames]).toEqual(["alice", "opschat"]);
        expect(allowed.unresolved).toEqual(["t.me/+invite", "t.me/c/55"]);
    });
});

describe("allowedUsernameExtract", () => {
    it("strips handle and link prefixes", () => {
        expect(allowedUsernameExtract("@bob")).toBe("bob");
        expect(allowedUsernameExtract("http://t.me/bob")).toBe("bob");
        expect(allowedUsernameExtract("bob")).toBe("bob");
    });

    it("rejects invite links and nested paths", () => {
        expect(allowedUsernameExtract("https://t.me/+abc")).toBeNull();
        expect(allowedUsernameExtract("t.me/bob/12")).toBeNull();
        expect(allowedUsernameExtract("@")).toBeNull();
    });
});
