import type { z } from 'zod';
import { MalformedOutputError, errorMessage } from '../errors.js';

export type ParseOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: MalformedOutputError };

/**
 * Parse and validate JSON printed by an external tool.
 *
 * A syntax error or a schema mismatch comes back as a MalformedOutputError
 * value instead of an exception.
 */
export function parseJsonOutput<T>(
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    source: string,
): ParseOutcome<T> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        return { ok: false, error: new MalformedOutputError(source, errorMessage(err)) };
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return { ok: false, error: new MalformedOutputError(source, `${where}${issue?.message ?? 'invalid shape'}`) };
    }

    return { ok: true, value: parsed.data };
}
