import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CHANGESET_COMMITTED_EVENT } from '../catalog.constants';
import { CatalogChangeSet, CatalogEntityName } from '../entities/change-set.entity';

export interface ChangeSetCommittedEvent {
    type: 'PRODUCT_CREATED' | 'PRODUCT_UPDATED' | 'CATEGORY_TREE_UPDATED';
    changeSet: CatalogChangeSet;
    counts: Partial<Record<CatalogEntityName, number>>;
}

export function countEntries(changeSet: CatalogChangeSet): Partial<Record<CatalogEntityName, number>> {
    const counts: Partial<Record<CatalogEntityName, number>> = {};
    for (const entry of changeSet.Entries) {
        counts[entry.entity] = (counts[entry.entity] ?? 0) + 1;
    }
    return counts;
}

@Injectable()
export class CatalogEventsService {
    private readonly logger = new Logger(CatalogEventsService.name);

    constructor(private readonly eventEmitter: EventEmitter2) {}

    /**
     * Runs every listener to completion. The change set is already committed at this
     * point, so a failing listener is logged and the caller's result stands.
     */
    async emitChangeSetCommitted(type: ChangeSetCommittedEvent['type'], changeSet: CatalogChangeSet): Promise<void> {
        const event: ChangeSetCommittedEvent = { type, changeSet, counts: countEntries(changeSet) };
        this.logger.debug(`Emitting ${type} for change set ${changeSet.Id}`);
        try {
            await this.eventEmitter.emitAsync(CHANGESET_COMMITTED_EVENT, event);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`Listener failed for change set ${changeSet.Id}: ${message}`);
        }
    }
}
