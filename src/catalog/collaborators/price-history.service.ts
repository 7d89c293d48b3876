import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../common/supabase.service';
import { CatalogChangeSet } from '../entities/change-set.entity';

export interface PriceHistoryEntry {
    Id?: string; // bigserial
    VariantId: string; // uuid NOT NULL REFERENCES ProductVariants(Id)
    Field: 'purchase' | 'sale'; // text NOT NULL
    OldPrice: number | null; // numeric(10,2)
    NewPrice: number | null; // numeric(10,2)
    ChangedAt: string; // timestamptz NOT NULL
    Actor: string | null; // text
    TransactionId: string; // uuid NOT NULL, CatalogChangeSets.Id
}

export function toPriceHistoryEntries(changeSet: CatalogChangeSet): PriceHistoryEntry[] {
    return changeSet.PriceTransitions.map((transition) => ({
        VariantId: transition.variantId,
        Field: transition.field,
        OldPrice: transition.oldPrice,
        NewPrice: transition.newPrice,
        ChangedAt: changeSet.CreatedAt,
        Actor: changeSet.Actor,
        TransactionId: changeSet.Id,
    }));
}

/**
 * Receives the price transitions of committed change sets. Without a Supabase project
 * the entries are kept in process, which is what the in-memory catalog store pairs with.
 */
@Injectable()
export class PriceHistoryService {
    private readonly logger = new Logger(PriceHistoryService.name);
    private readonly local: PriceHistoryEntry[] = [];

    constructor(private readonly supabaseService: SupabaseService) {}

    async recordTransitions(changeSet: CatalogChangeSet): Promise<number> {
        const entries = toPriceHistoryEntries(changeSet);
        if (entries.length === 0) return 0;

        if (!this.supabaseService.isConfigured()) {
            this.local.push(...entries);
            return entries.length;
        }

        const { error } = await this.supabaseService.getServiceClient().from('PriceHistory').insert(entries);
        if (error) {
            this.logger.error(`Failed to record ${entries.length} price transition(s) of change set ${changeSet.Id}: ${error.message}`);
            return 0;
        }
        return entries.length;
    }

    /** Entries kept in process, newest last. */
    localHistory(variantId?: string): PriceHistoryEntry[] {
        return this.local.filter((entry) => variantId === undefined || entry.VariantId === variantId);
    }
}
