export type RecommendationStrategy = 'preference' | 'loan-history';

export interface NamespaceOptions {
    /** Base IRI for bare tokens and the empty prefix */
    defaultNamespace?: string;
    /** Extra prefix bindings, e.g. { foaf: 'http://xmlns.com/foaf/0.1/' } */
    prefixes?: Record<string, string>;
}

export interface RuleEngineOptions extends NamespaceOptions {
    recommendation?: RecommendationStrategy;
}

export interface ReasonerConfig {
    defaultNamespace: string;
    prefixes: Record<string, string>;
    recommendation: RecommendationStrategy;
    verbose: boolean;
}

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
export const OWL_NS = 'http://www.w3.org/2002/07/owl#';

export const DEFAULTS = {
    defaultNamespace: 'http://example.org/library#',
    recommendation: 'preference',
    notApplicable: 'N/A',
    verbosity: 'standard',
} as const;
