import { z } from 'zod';
import { DEFAULTS, createInvalidArgumentError } from '../types/index.js';

export const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).default(DEFAULTS.verbosity);

export const ruleModeSchema = z.enum(['none', 'basic', 'advanced', 'custom', 'declarative']);

export const dataFormatSchema = z.enum(['Turtle', 'N-Triples', 'N3']).default('Turtle');

export const runQueryArgsSchema = z.object({
    data: z.string(),
    data_format: dataFormatSchema,
    query: z.string().min(1),
    form: z.enum(['select', 'ask', 'construct', 'describe']).optional(),
    rule_mode: ruleModeSchema.default('none'),
    rules: z.string().optional(),
    verbosity: verbositySchema,
});

export const applyRulesArgsSchema = z.object({
    data: z.string(),
    data_format: dataFormatSchema,
    rule_mode: ruleModeSchema,
    rules: z.string().optional(),
    verbosity: verbositySchema,
});

export const checkRulesArgsSchema = z.object({
    rules: z.string(),
});

export type RunQueryArgs = z.infer<typeof runQueryArgsSchema>;
export type ApplyRulesArgs = z.infer<typeof applyRulesArgsSchema>;
export type CheckRulesArgs = z.infer<typeof checkRulesArgsSchema>;

/**
 * Validate tool arguments. Throws INVALID_ARGUMENT naming the first bad field.
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue.path.join('.') || 'arguments';
        throw createInvalidArgumentError(`Invalid argument '${field}': ${issue.message}`, { field });
    }
    return parsed.data;
}
