#!/usr/bin/env node
import { readFileSync } from 'fs';
import type { QueryResult, RuleMode } from './types/index.js';
import { isReasonerException } from './types/index.js';
import { loadConfig } from './config.js';
import { readGraphFile, serializeGraph } from './io/turtle.js';
import { GraphReasoner } from './reasoner.js';
import { checkRules } from './rules/declarative.js';
import { parseRuleMode } from './rules/engine.js';
import { createLogger } from './utils/logger.js';

const VERSION = '1.0.0';
const HELP = `
graph-reasoner CLI v${VERSION}

Usage:
  graph-reasoner query <data.ttl> <query.rq>   Answer a query, optionally after applying rules
  graph-reasoner apply <data.ttl>              Apply rules and print the graph as N-Triples
  graph-reasoner validate-rules <rules.txt>    Check declarative rules line by line

Options:
  --form=<form>          Expected query form (select, ask, construct, describe)
  --rules=<mode>         Rule tier (none, basic, advanced, custom, declarative). Default: none
  --rules-file=<file>    Rule text for custom/declarative; with basic/advanced it runs
                         as a declarative batch after the fixed rules
  --namespace=<iri>      Default namespace for bare rule words and the ':' prefix
  --verbose              Log rule activity to stderr
  --help, -h             Show this help
  --version, -v          Show version

Examples:
  graph-reasoner query --rules=advanced library.ttl recommendations.rq
  graph-reasoner apply --rules=declarative --rules-file=rules.txt library.ttl
`;

const args = process.argv.slice(2);
const options: Record<string, string> = {};
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--') && arg.includes('=')) {
        const eq = arg.indexOf('=');
        options[arg.slice(2, eq)] = arg.slice(eq + 1);
    } else if (['--form', '--rules', '--rules-file', '--namespace'].includes(arg)) {
        if (i + 1 < args.length) {
            options[arg.slice(2)] = args[i + 1];
            i++;
        }
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const commandName = cleanArgs[0];

function formatResult(result: QueryResult): string {
    switch (result.form) {
        case 'select':
            return [result.headers, ...result.rows].map(row => row.join('\t')).join('\n');
        case 'ask':
            return String(result.value);
        case 'construct':
        case 'describe':
            return serializeGraph(result.graph).trimEnd();
    }
}

function ruleModes(): RuleMode[] {
    const kind = options['rules'] ?? 'none';
    const file = options['rules-file'];
    const text = file !== undefined ? readFileSync(file, 'utf-8') : undefined;

    if (text !== undefined && (kind === 'basic' || kind === 'advanced')) {
        return [parseRuleMode(kind), { kind: 'declarative', text }];
    }
    return [parseRuleMode(kind, text)];
}

async function main() {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    const config = loadConfig({
        ...process.env,
        ...(options['namespace'] && { GRAPH_REASONER_NAMESPACE: options['namespace'] }),
        ...(args.includes('--verbose') && { GRAPH_REASONER_VERBOSE: 'true' }),
    });
    const reasoner = new GraphReasoner(config, createLogger('graph-reasoner', { verbose: config.verbose }));

    switch (commandName) {
        case 'query': {
            const [, dataFile, queryFile] = cleanArgs;
            if (!dataFile || !queryFile) {
                console.error('Error: data and query file arguments required');
                process.exit(1);
            }
            const graph = await readGraphFile(dataFile);
            const { result, diagnostics } = reasoner.reason(graph, {
                modes: ruleModes(),
                query: readFileSync(queryFile, 'utf-8'),
                form: options['form'],
            });
            for (const d of diagnostics) {
                console.error(`✗ line ${d.line}: ${d.error.message}`);
            }
            console.log(formatResult(result));
            break;
        }
        case 'apply': {
            const dataFile = cleanArgs[1];
            if (!dataFile) {
                console.error('Error: data file argument required');
                process.exit(1);
            }
            const graph = await readGraphFile(dataFile);
            const application = reasoner.applyRules(graph, ruleModes());
            for (const d of application.diagnostics) {
                console.error(`✗ line ${d.line}: ${d.error.message}`);
            }
            process.stdout.write(serializeGraph(application.graph));
            break;
        }
        case 'validate-rules': {
            const rulesFile = cleanArgs[1];
            if (!rulesFile) {
                console.error('Error: rules file argument required');
                process.exit(1);
            }
            const checks = checkRules(readFileSync(rulesFile, 'utf-8'), reasoner.namespaces);
            for (const check of checks) {
                if (check.valid) {
                    console.log(`✓ ${check.source}`);
                } else {
                    console.log(`✗ ${check.source}`);
                    console.log(`  Error (line ${check.line}): ${check.error?.message}`);
                    if (check.error?.suggestion) console.log(`  Suggestion: ${check.error.suggestion}`);
                }
            }
            process.exit(checks.every(c => c.valid) ? 0 : 1);
            break;
        }
        default:
            console.error(`Unknown command: ${commandName}`);
            console.log(HELP);
            process.exit(1);
    }
}

main().catch((e: unknown) => {
    if (isReasonerException(e)) {
        console.error(`Error [${e.code}]: ${e.message}`);
        if (e.error.suggestion) console.error(`Suggestion: ${e.error.suggestion}`);
    } else {
        console.error(e instanceof Error ? e.message : String(e));
    }
    process.exit(1);
});
