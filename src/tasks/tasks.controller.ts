import { Controller, Post, Logger, Headers, HttpCode, HttpStatus } from '@nestjs/common';
import { CategoryMaintenanceService } from './category-maintenance.service';

@Controller('tasks')
export class TasksController {
  private readonly logger = new Logger(TasksController.name);

  constructor(private readonly categoryMaintenanceService: CategoryMaintenanceService) {}

  /**
   * Manual run of the nightly orphan-category prune.
   */
  @Post('prune-categories')
  @HttpCode(HttpStatus.OK)
  async pruneCategories(@Headers('x-user-id') userId?: string) {
    this.logger.log(`Orphan category prune requested by ${userId ?? 'anonymous'}`);
    const removed = await this.categoryMaintenanceService.pruneOrphanCategories(userId ?? null);
    return {
      success: true,
      removed,
      message: `Removed ${removed} orphan categories`,
    };
  }
}
