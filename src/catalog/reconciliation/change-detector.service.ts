import { Injectable, Logger } from '@nestjs/common';
import { FacetName } from '../../common/errors/catalog.errors';
import { stableHash } from '../../common/utils/stable-hash';
import { RawFacets } from '../types/facet-specs.types';

export const FACET_NAMES: FacetName[] = ['attributes', 'variants', 'groups', 'categories'];

export type FacetState = 'unchanged' | 'changed' | 'cleared';

export type FacetReason = 'omitted' | 'same-hash' | 'content' | 'empty' | 'dependency';

export interface FacetDecision {
    state: FacetState;
    reason: FacetReason;
    hash: string | null; // hash to store after the save
}

export type FacetDecisions = Record<FacetName, FacetDecision>;

export type StoredHashes = Record<FacetName, string | null>;

export const EMPTY_FACET_HASH = stableHash([]);

export function rawFacet(raw: RawFacets, facet: FacetName): unknown {
    switch (facet) {
        case 'attributes':
            return raw.attributes_json;
        case 'variants':
            return raw.variants_json;
        case 'groups':
            return raw.groups_json;
        case 'categories':
            return raw.categories_json;
    }
}

export function needsReconciliation(decision: FacetDecision): boolean {
    return decision.state !== 'unchanged' || decision.reason === 'dependency';
}

/**
 * Gate in front of reconciliation. A facet missing from the request is left alone;
 * an explicit null or [] clears it; anything else is compared by content hash.
 */
@Injectable()
export class ChangeDetector {
    private readonly logger = new Logger(ChangeDetector.name);

    detect(raw: RawFacets, stored: StoredHashes): FacetDecisions {
        const decisions: FacetDecisions = {
            attributes: this.decide(raw.attributes_json, stored.attributes),
            variants: this.decide(raw.variants_json, stored.variants),
            groups: this.decide(raw.groups_json, stored.groups),
            categories: this.decide(raw.categories_json, stored.categories),
        };
        this.logger.debug(
            `Facet decisions: ${FACET_NAMES.map((facet) => `${facet}=${decisions[facet].state}/${decisions[facet].reason}`).join(', ')}`,
        );
        return decisions;
    }

    /**
     * Marks an unchanged facet for re-reconciliation because a facet it depends on
     * changed. The stored hash is kept since its content did not change.
     */
    markDependent(decisions: FacetDecisions, facet: FacetName): void {
        if (decisions[facet].state === 'unchanged') {
            decisions[facet] = { ...decisions[facet], reason: 'dependency' };
        }
    }

    private decide(incoming: unknown, storedHash: string | null): FacetDecision {
        if (incoming === undefined) {
            return { state: 'unchanged', reason: 'omitted', hash: storedHash };
        }
        if (incoming === null || (Array.isArray(incoming) && incoming.length === 0)) {
            return storedHash === EMPTY_FACET_HASH
                ? { state: 'unchanged', reason: 'same-hash', hash: storedHash }
                : { state: 'cleared', reason: 'empty', hash: EMPTY_FACET_HASH };
        }
        const hash = stableHash(incoming);
        return hash === storedHash
            ? { state: 'unchanged', reason: 'same-hash', hash }
            : { state: 'changed', reason: 'content', hash };
    }
}
