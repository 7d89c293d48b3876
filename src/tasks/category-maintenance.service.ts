import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { CategoryTreeService } from '../catalog/category-tree.service';

@Injectable()
export class CategoryMaintenanceService {
    private readonly logger = new Logger(CategoryMaintenanceService.name);

    constructor(
        private readonly configService: ConfigService,
        private readonly categoryTreeService: CategoryTreeService,
    ) {}

    @Cron(CronExpression.EVERY_DAY_AT_3AM, { name: 'pruneOrphanCategories' })
    async handleNightlyPrune(): Promise<void> {
        const enabled = this.configService.get<string>('CATEGORY_MAINTENANCE_ENABLED');
        if (enabled && enabled.toLowerCase() === 'false') {
            this.logger.debug('[CRON - pruneOrphanCategories] Disabled via CATEGORY_MAINTENANCE_ENABLED=false');
            return;
        }
        try {
            await this.pruneOrphanCategories();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`[CRON - pruneOrphanCategories] Error: ${message}`, error instanceof Error ? error.stack : undefined);
        }
    }

    /** Removes categories with no products and no children; returns how many went. */
    async pruneOrphanCategories(actor: string | null = null): Promise<number> {
        this.logger.log('[pruneOrphanCategories] Starting');
        const removed = await this.categoryTreeService.pruneOrphans(actor);
        this.logger.log(`[pruneOrphanCategories] Removed ${removed} orphan categories`);
        return removed;
    }
}
