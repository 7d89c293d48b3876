import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ActivityLogService } from '../../common/activity-log.service';
import { CHANGESET_COMMITTED_EVENT } from '../catalog.constants';
import { PriceHistoryService } from '../collaborators/price-history.service';
import { ChangeSetCommittedEvent } from './catalog-events.service';

@Injectable()
export class CatalogEventListenersService {
    private readonly logger = new Logger(CatalogEventListenersService.name);

    constructor(
        private readonly activityLogService: ActivityLogService,
        private readonly priceHistoryService: PriceHistoryService,
    ) {}

    @OnEvent(CHANGESET_COMMITTED_EVENT)
    async handleChangeSetCommitted(event: ChangeSetCommittedEvent): Promise<void> {
        const { changeSet } = event;
        const summary = Object.entries(event.counts)
            .map(([entity, count]) => `${entity}=${count}`)
            .join(', ');

        await this.activityLogService.logActivity({
            UserId: changeSet.Actor,
            EntityType: changeSet.ProductId ? 'Product' : 'Category',
            EntityId: changeSet.ProductId,
            EventType: event.type,
            Status: 'Success',
            Message: `Change set ${changeSet.Id} committed (${summary || 'no entries'})`,
            Details: { transactionId: changeSet.Id, counts: event.counts, expectedVersion: changeSet.ExpectedVersion },
        });

        if (changeSet.PriceTransitions.length > 0) {
            const recorded = await this.priceHistoryService.recordTransitions(changeSet);
            this.logger.debug(`Recorded ${recorded} price transition(s) for change set ${changeSet.Id}`);
        }
    }
}
