import { Injectable, Logger } from '@nestjs/common';
import { Variant } from '../entities/variant.entity';

/** One co-occurring option pair; typeA/optionA always sorts before typeB/optionB by type id. */
export interface CompatibilityPair {
    typeA: string;
    optionA: string;
    typeB: string;
    optionB: string;
}

const pairKey = (optionA: string, optionB: string): string =>
    optionA < optionB ? `${optionA}|${optionB}` : `${optionB}|${optionA}`;

/**
 * Lookup view over the persisted pairs. Two options of the same type are never
 * compatible with each other; options of types that never meet on a variant are
 * unconstrained.
 */
export class CompatibilityRelation {
    private readonly pairs = new Set<string>();
    private readonly typePairs = new Set<string>();

    constructor(pairs: CompatibilityPair[]) {
        for (const pair of pairs) {
            this.pairs.add(pairKey(pair.optionA, pair.optionB));
            this.typePairs.add(pairKey(pair.typeA, pair.typeB));
        }
    }

    get size(): number {
        return this.pairs.size;
    }

    compatible(typeA: string, optionA: string, typeB: string, optionB: string): boolean {
        if (typeA === typeB) return optionA === optionB;
        if (!this.typePairs.has(pairKey(typeA, typeB))) return true;
        return this.pairs.has(pairKey(optionA, optionB));
    }
}

@Injectable()
export class DependencyInferenceService {
    private readonly logger = new Logger(DependencyInferenceService.name);

    /**
     * Scans the active variants of one product and returns every option pair that
     * co-occurs on at least one of them, ordered by type ids then option ids.
     */
    infer(variants: Variant[]): CompatibilityPair[] {
        const seen = new Map<string, CompatibilityPair>();
        for (const variant of variants) {
            if (!variant.IsActive) continue;
            const entries = Object.entries(variant.Selection).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
            for (let i = 0; i < entries.length; i++) {
                for (let j = i + 1; j < entries.length; j++) {
                    const [typeA, optionA] = entries[i];
                    const [typeB, optionB] = entries[j];
                    const key = `${typeA}:${optionA}|${typeB}:${optionB}`;
                    if (!seen.has(key)) seen.set(key, { typeA, optionA, typeB, optionB });
                }
            }
        }
        const pairs = [...seen.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, pair]) => pair);
        this.logger.debug(`Inferred ${pairs.length} compatible option pair(s) from ${variants.length} variant(s)`);
        return pairs;
    }
}
