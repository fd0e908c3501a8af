import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (answer only), 'standard' (default), 'detailed' (rule steps and timing)",
};

const dataSchema = {
    type: 'string',
    description: 'Graph data as Turtle (default), N-Triples or N3 facts',
};

const dataFormatSchema = {
    type: 'string',
    enum: ['Turtle', 'N-Triples', 'N3'],
    description: "Format of 'data'. Default: 'Turtle'.",
};

const ruleModeSchema = {
    type: 'string',
    enum: ['none', 'basic', 'advanced', 'custom', 'declarative'],
    description: "Rule tier: 'basic' and 'advanced' run the fixed library rules, 'custom' the IF/THEN heuristics, 'declarative' one 'antecedent => consequent' rule per line",
};

const rulesSchema = {
    type: 'string',
    description: "Rule text for the 'custom' and 'declarative' tiers, one rule per line",
};

export const TOOLS: Tool[] = [
    {
        name: 'run-query',
        description: `Answer a basic graph pattern query against graph data, optionally after applying rules.

**When to use:** You have triples and want bindings (SELECT), a yes/no answer (ASK), or a derived graph (CONSTRUCT/DESCRIBE).

**Example:**
  data: "@prefix ex: <http://example.org/library#> . ex:Book1 ex:hasAuthor ex:AuthorA ."
  query: "SELECT ?b WHERE { ?b ex:hasAuthor ex:AuthorA }"
  → Returns: { form: "select", result: { headers: ["b"], rows: [["http://example.org/library#Book1"]] } }

**Common issues:**
- Unbound SELECT variables appear as "N/A"
- FILTER, OPTIONAL and UNION are not supported`,
        inputSchema: {
            type: 'object',
            properties: {
                data: dataSchema,
                data_format: dataFormatSchema,
                query: {
                    type: 'string',
                    description: 'SELECT, ASK, CONSTRUCT or DESCRIBE query text',
                },
                form: {
                    type: 'string',
                    enum: ['select', 'ask', 'construct', 'describe'],
                    description: 'Expected query form; must match the form the query declares',
                },
                rule_mode: ruleModeSchema,
                rules: rulesSchema,
                verbosity: verbositySchema,
            },
            required: ['data', 'query'],
        },
    },
    {
        name: 'apply-rules',
        description: `Apply a rule tier to graph data and return the enriched graph as N-Triples.

**Example:**
  rule_mode: "declarative"
  rules: "?b ex:hasAuthor ?a => ?a ex:wrote ?b"

Declarative rules that fail to parse are skipped and reported in 'diagnostics'; the other rules still run.`,
        inputSchema: {
            type: 'object',
            properties: {
                data: dataSchema,
                data_format: dataFormatSchema,
                rule_mode: ruleModeSchema,
                rules: rulesSchema,
                verbosity: verbositySchema,
            },
            required: ['data', 'rule_mode'],
        },
    },
    {
        name: 'check-rules',
        description: 'Check declarative rule text line by line without applying it. Returns each line with its parse error, if any.',
        inputSchema: {
            type: 'object',
            properties: {
                rules: rulesSchema,
            },
            required: ['rules'],
        },
    },
];
