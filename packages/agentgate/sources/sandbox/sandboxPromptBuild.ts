import type { Sandbox } from "@/types";
import { sandboxFilesList } from "./sandboxFilesList.js";

export const SANDBOX_PROMPT_SKILL = "$log-archive-triage";

/**
 * Builds the prompt block that points the agent at the sandbox contents.
 * Returns an empty string when the sandbox holds no files.
 */
export async function sandboxPromptBuild(sandbox: Sandbox, requestText: string, uploadedFile?: string): Promise<string> {
    const files = await sandboxFilesList(sandbox);
    if (files.length === 0) {
        return "";
    }
    const lines = [SANDBOX_PROMPT_SKILL, `Request: ${requestText}`, `Sandbox path: ${sandbox.exposedLink}`];
    if (uploadedFile) {
        lines.push(`Uploaded file: ${uploadedFile}`);
    }
    lines.push("Files available in the sandbox:", ...files.map((file) => `- ${file}`));
    return lines.join("\n");
}
