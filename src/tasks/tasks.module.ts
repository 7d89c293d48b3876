import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { CategoryMaintenanceService } from './category-maintenance.service';
import { TasksController } from './tasks.controller';

@Module({
  imports: [CatalogModule],
  providers: [CategoryMaintenanceService],
  controllers: [TasksController],
})
export class TasksModule {}
