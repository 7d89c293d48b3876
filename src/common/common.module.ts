import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';
import { ActivityLogService } from './activity-log.service';

@Module({
  imports: [ConfigModule],
  providers: [
    ActivityLogService,
    {
      provide: SupabaseService,
      useFactory: async (configService: ConfigService) => {
        const service = new SupabaseService(configService);
        await service.initialize();
        return service;
      },
      inject: [ConfigService],
    },
  ],
  exports: [SupabaseService, ActivityLogService],
})
export class CommonModule {}
