import { z } from "zod";

import { ConfigError } from "./configError.js";

const optionalText = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

const requiredText = (name: string) =>
    z
        .string({ required_error: `${name} is required` })
        .trim()
        .min(1, `${name} is required`);

const configEnvSchema = z.object({
    TELEGRAM_BOT_TOKEN: requiredText("TELEGRAM_BOT_TOKEN"),
    ALLOWED_CHAT_USER_IDS: requiredText("ALLOWED_CHAT_USER_IDS"),
    AGENT_COMMAND: optionalText,
    AGENT_ARGS: optionalText,
    AGENT_MODEL: optionalText,
    CODEX_MODEL: optionalText,
    AGENT_PREAMBLE_PATH: optionalText,
    AGENTGATE_SANDBOX_ROOT: optionalText,
    AGENTGATE_MAX_UPLOAD_BYTES: optionalText.pipe(
        z.coerce.number().int().positive("AGENTGATE_MAX_UPLOAD_BYTES must be a positive integer").optional()
    )
});

export type ConfigEnv = z.infer<typeof configEnvSchema>;

/**
 * Validates the environment variables the gateway reads.
 * Expects: blank optional values are treated as unset.
 */
export function configEnvParse(env: Record<string, string | undefined>): ConfigEnv {
    const result = configEnvSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(
            "Invalid configuration",
            result.error.issues.map((issue) =>
                issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
                    ? `${issue.path.join(".")}: ${issue.message}`
                    : issue.message
            )
        );
    }
    return result.data;
}
