import type { IriTerm } from '../types/terms.js';
import { RDF_NS } from '../types/options.js';
import { Namespaces } from '../graph/namespaces.js';
import { iri } from '../graph/term.js';

/**
 * Library-domain terms used by the fixed rule sets, minted in the default namespace
 */
export interface LibraryVocabulary {
    type: IriTerm;
    Book: IriTerm;
    Loan: IriTerm;
    FrequentBorrower: IriTerm;
    hasAuthor: IriTerm;
    wrote: IriTerm;
    hasGenre: IriTerm;
    relatedTo: IriTerm;
    borrowedBy: IriTerm;
    hasExpertise: IriTerm;
    prefersGenre: IriTerm;
    recommendedFor: IriTerm;
}

export function libraryVocabulary(namespaces: Namespaces = new Namespaces()): LibraryVocabulary {
    const term = (localName: string) => iri(namespaces.defaultNamespace + localName);
    return {
        type: iri(RDF_NS + 'type'),
        Book: term('Book'),
        Loan: term('Loan'),
        FrequentBorrower: term('FrequentBorrower'),
        hasAuthor: term('hasAuthor'),
        wrote: term('wrote'),
        hasGenre: term('hasGenre'),
        relatedTo: term('relatedTo'),
        borrowedBy: term('borrowedBy'),
        hasExpertise: term('hasExpertise'),
        prefersGenre: term('prefersGenre'),
        recommendedFor: term('recommendedFor'),
    };
}
