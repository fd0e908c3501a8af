/**
 * Environment configuration.
 *
 *   GRAPH_REASONER_NAMESPACE       default namespace, must end with '#' or '/'
 *   GRAPH_REASONER_PREFIXES        extra prefixes, e.g. "foaf=http://xmlns.com/foaf/0.1/,dc=http://purl.org/dc/terms/"
 *   GRAPH_REASONER_RECOMMENDATION  'preference' | 'loan-history'
 *   GRAPH_REASONER_VERBOSE         '1' or 'true' enables info/debug logging
 */

import { z } from 'zod';
import type { ReasonerConfig } from './types/options.js';
import { DEFAULTS } from './types/options.js';
import { createInvalidArgumentError } from './types/errors.js';

const PREFIX_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

const namespaceSchema = z
    .string()
    .url()
    .refine(ns => ns.endsWith('#') || ns.endsWith('/'), {
        message: "Namespace must end with '#' or '/'",
    });

const prefixesSchema = z.string().transform((raw, ctx) => {
    const prefixes: Record<string, string> = {};
    for (const entry of raw.split(',').map(e => e.trim()).filter(Boolean)) {
        const eq = entry.indexOf('=');
        const prefix = eq === -1 ? '' : entry.slice(0, eq).trim();
        const base = eq === -1 ? '' : entry.slice(eq + 1).trim();
        if (!PREFIX_NAME.test(prefix) || !base) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Invalid prefix binding '${entry}', expected 'prefix=iri'`,
            });
            return z.NEVER;
        }
        prefixes[prefix] = base;
    }
    return prefixes;
});

const envSchema = z.object({
    GRAPH_REASONER_NAMESPACE: namespaceSchema.default(DEFAULTS.defaultNamespace),
    GRAPH_REASONER_PREFIXES: prefixesSchema.default(''),
    GRAPH_REASONER_RECOMMENDATION: z.enum(['preference', 'loan-history']).default(DEFAULTS.recommendation),
    GRAPH_REASONER_VERBOSE: z
        .string()
        .default('')
        .transform(v => v === '1' || v.toLowerCase() === 'true'),
});

/**
 * Load configuration from environment variables. Throws INVALID_ARGUMENT.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ReasonerConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw createInvalidArgumentError(
            `Invalid configuration ${issue.path.join('.')}: ${issue.message}`,
            { issues: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })) }
        );
    }

    return {
        defaultNamespace: parsed.data.GRAPH_REASONER_NAMESPACE,
        prefixes: parsed.data.GRAPH_REASONER_PREFIXES,
        recommendation: parsed.data.GRAPH_REASONER_RECOMMENDATION,
        verbose: parsed.data.GRAPH_REASONER_VERBOSE,
    };
}
