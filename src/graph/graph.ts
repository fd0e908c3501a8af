/**
 * In-memory triple set.
 *
 * Triples are keyed by their canonical form, so adding a structurally equal
 * triple twice is a no-op. A predicate index serves the common case of
 * patterns with a fixed predicate.
 */

import type { GroundTerm, Triple } from '../types/terms.js';
import { termEquals, termKey, tripleKey } from './term.js';

export class Graph implements Iterable<Triple> {
    private triples = new Map<string, Triple>();
    private byPredicate = new Map<string, Map<string, Triple>>();

    constructor(triples: Iterable<Triple> = []) {
        this.addAll(triples);
    }

    get size(): number {
        return this.triples.size;
    }

    /**
     * Add a triple. Returns false when an equal triple was already present.
     */
    add(triple: Triple): boolean {
        const key = tripleKey(triple);
        if (this.triples.has(key)) {
            return false;
        }
        this.triples.set(key, triple);

        const predicateKey = termKey(triple.predicate);
        let bucket = this.byPredicate.get(predicateKey);
        if (!bucket) {
            bucket = new Map();
            this.byPredicate.set(predicateKey, bucket);
        }
        bucket.set(key, triple);
        return true;
    }

    /**
     * Add every triple, returning how many were new.
     */
    addAll(triples: Iterable<Triple>): number {
        let added = 0;
        for (const t of triples) {
            if (this.add(t)) added++;
        }
        return added;
    }

    has(triple: Triple): boolean {
        return this.triples.has(tripleKey(triple));
    }

    /**
     * Triples agreeing with every given position; undefined positions match anything.
     */
    match(subject?: GroundTerm, predicate?: GroundTerm, object?: GroundTerm): Triple[] {
        let candidates: Iterable<Triple>;
        if (predicate) {
            const bucket = this.byPredicate.get(termKey(predicate));
            if (!bucket) return [];
            candidates = bucket.values();
        } else {
            candidates = this.triples.values();
        }

        const result: Triple[] = [];
        for (const t of candidates) {
            if (subject && !termEquals(subject, t.subject)) continue;
            if (object && !termEquals(object, t.object)) continue;
            result.push(t);
        }
        return result;
    }

    /** All (subject, object) pairs of a predicate */
    subjectObjects(predicate: GroundTerm): Array<[GroundTerm, GroundTerm]> {
        return this.match(undefined, predicate).map(t => [t.subject, t.object]);
    }

    subjects(predicate: GroundTerm, object: GroundTerm): GroundTerm[] {
        return this.match(undefined, predicate, object).map(t => t.subject);
    }

    objects(subject: GroundTerm, predicate: GroundTerm): GroundTerm[] {
        return this.match(subject, predicate).map(t => t.object);
    }

    copy(): Graph {
        return new Graph(this.triples.values());
    }

    union(other: Iterable<Triple>): Graph {
        const result = this.copy();
        result.addAll(other);
        return result;
    }

    toArray(): Triple[] {
        return [...this.triples.values()];
    }

    [Symbol.iterator](): Iterator<Triple> {
        return this.triples.values();
    }
}
