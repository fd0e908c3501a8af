/**
 * Prefix table used to resolve compact identifiers (`ex:hasAuthor`) and bare
 * rule tokens (`hasAuthor`) into IRIs.
 */

import type { IriTerm } from '../types/terms.js';
import { DEFAULTS, OWL_NS, RDFS_NS, RDF_NS, XSD_NS } from '../types/options.js';
import type { NamespaceOptions } from '../types/options.js';
import { createUnresolvedPrefixError } from '../types/errors.js';
import { iri } from './term.js';

/** Schemes whose IRIs carry no '//' but are still written out in full */
const OPAQUE_SCHEMES = new Set(['urn', 'mailto', 'tag', 'data', 'tel', 'did']);

const ABSOLUTE_IRI = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

export interface ResolveOptions {
    /** Treat a token without ':' as a local name in the default namespace */
    allowBare?: boolean;
}

export class Namespaces {
    readonly defaultNamespace: string;
    private prefixes = new Map<string, string>();

    constructor(options: NamespaceOptions = {}) {
        this.defaultNamespace = options.defaultNamespace ?? DEFAULTS.defaultNamespace;
        this.prefixes.set('rdf', RDF_NS);
        this.prefixes.set('rdfs', RDFS_NS);
        this.prefixes.set('xsd', XSD_NS);
        this.prefixes.set('owl', OWL_NS);
        this.prefixes.set('ex', this.defaultNamespace);
        this.prefixes.set('', this.defaultNamespace);
        for (const [prefix, base] of Object.entries(options.prefixes ?? {})) {
            this.prefixes.set(prefix, base);
        }
    }

    bind(prefix: string, base: string): void {
        this.prefixes.set(prefix, base);
    }

    get(prefix: string): string | undefined {
        return this.prefixes.get(prefix);
    }

    has(prefix: string): boolean {
        return this.prefixes.has(prefix);
    }

    entries(): Array<[string, string]> {
        return [...this.prefixes.entries()];
    }

    /**
     * Copy of this table with additional bindings (e.g. a query's PREFIX declarations)
     */
    extend(prefixes: Record<string, string>): Namespaces {
        const copy = new Namespaces({ defaultNamespace: this.defaultNamespace });
        copy.prefixes = new Map(this.prefixes);
        for (const [prefix, base] of Object.entries(prefixes)) {
            copy.prefixes.set(prefix, base);
        }
        return copy;
    }

    /**
     * Resolve `prefix:local` through the table. Throws UNRESOLVED_PREFIX.
     */
    resolve(compact: string): IriTerm {
        const colon = compact.indexOf(':');
        const prefix = colon === -1 ? compact : compact.slice(0, colon);
        const base = this.prefixes.get(prefix);
        if (colon === -1 || base === undefined) {
            throw createUnresolvedPrefixError(prefix, compact);
        }
        return iri(base + compact.slice(colon + 1));
    }

    /**
     * Resolve a single token from rule or query text into an IRI.
     */
    resolveToken(token: string, options: ResolveOptions = {}): IriTerm {
        if (token.startsWith('<') && token.endsWith('>')) {
            return iri(token.slice(1, -1));
        }

        const colon = token.indexOf(':');
        if (colon === -1) {
            if (options.allowBare) {
                return iri(this.defaultNamespace + token);
            }
            throw createUnresolvedPrefixError(token, token);
        }

        const prefix = token.slice(0, colon);
        if (this.prefixes.has(prefix)) {
            return this.resolve(token);
        }
        if (looksLikeAbsoluteIri(token)) {
            return iri(token);
        }
        throw createUnresolvedPrefixError(prefix, token);
    }
}

/**
 * True for tokens that are already full IRIs: `scheme://...` or an opaque scheme like `urn:`
 */
export function looksLikeAbsoluteIri(token: string): boolean {
    if (ABSOLUTE_IRI.test(token)) return true;
    const colon = token.indexOf(':');
    return colon > 0 && OPAQUE_SCHEMES.has(token.slice(0, colon).toLowerCase());
}
