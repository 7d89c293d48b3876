import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from './supabase.service';
import { SupabaseClient } from '@supabase/supabase-js';

export interface ActivityLogEntry {
    Id?: string; // bigserial, will be auto-generated
    Timestamp?: string; // timestamptz, will default to now()
    UserId?: string | null; // text, nullable - the x-user-id of the operator
    EntityType?: string | null; // text, nullable - 'Product', 'Category'
    EntityId?: string | null; // text, nullable - the ID of the entity being acted upon
    EventType: string; // text, required - the type of event/action
    Status: string; // text, required - 'Success', 'Failed'
    Message: string; // text, required - human-readable description
    Details?: Record<string, unknown> | null; // jsonb, nullable - additional structured data
}

@Injectable()
export class ActivityLogService {
    private readonly logger = new Logger(ActivityLogService.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    private getSupabaseClient(): SupabaseClient {
        return this.supabaseService.getServiceClient();
    }

    /**
     * Generic method to log any activity. Never throws: the audit trail must not fail the
     * operation it describes.
     */
    async logActivity(entry: ActivityLogEntry): Promise<void> {
        if (!this.supabaseService.isConfigured()) {
            this.logger.debug(`Activity (not persisted): ${entry.EventType} - ${entry.Message}`);
            return;
        }
        try {
            const { error } = await this.getSupabaseClient()
                .from('ActivityLogs')
                .insert({
                    Timestamp: entry.Timestamp || new Date().toISOString(),
                    UserId: entry.UserId || null,
                    EntityType: entry.EntityType || null,
                    EntityId: entry.EntityId || null,
                    EventType: entry.EventType,
                    Status: entry.Status,
                    Message: entry.Message,
                    Details: entry.Details || null,
                });

            if (error) {
                this.logger.error(`Failed to log activity: ${error.message}`);
            } else {
                this.logger.debug(`Activity logged: ${entry.EventType} - ${entry.Message}`);
            }
        } catch (error) {
            this.logger.error(`Exception while logging activity: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
