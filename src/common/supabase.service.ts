import { Injectable, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);
  private _supabase?: SupabaseClient;
  private _supabaseService?: SupabaseClient;
  private initializationPromise: Promise<void> | null = null;

  constructor(private configService: ConfigService) {}

  async initialize(): Promise<void> {
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = (async () => {
      const supabaseUrl = this.configService.get<string>('SUPABASE_URL');
      const supabaseAnonKey = this.configService.get<string>('SUPABASE_ANON_KEY');
      const supabaseServiceKey = this.configService.get<string>('SUPABASE_SERVICE_ROLE_KEY');
      const storeMode = this.configService.get<string>('CATALOG_STORE', 'supabase');

      if (!supabaseUrl || !supabaseAnonKey) {
        if (storeMode === 'memory') {
          this.logger.warn('Supabase is not configured; running with the in-memory catalog store only.');
          return;
        }
        this.logger.error('SUPABASE_URL or SUPABASE_ANON_KEY missing in config! Supabase client NOT initialized.');
        throw new InternalServerErrorException('Supabase config missing for client initialization.');
      }

      try {
        this._supabase = createClient(supabaseUrl, supabaseAnonKey);
        this.logger.log('Supabase client (anon key) initialized successfully.');

        if (supabaseServiceKey) {
          this._supabaseService = createClient(supabaseUrl, supabaseServiceKey);
          this.logger.log('Supabase service client (service_role key) initialized successfully.');
        } else {
          this.logger.warn('SUPABASE_SERVICE_ROLE_KEY missing in config! Catalog writes will run through the anon client and its RLS policies.');
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to initialize Supabase clients: ${message}`);
        throw new InternalServerErrorException(`Failed to initialize Supabase clients: ${message}`);
      }
    })();

    return this.initializationPromise;
  }

  isConfigured(): boolean {
    return this._supabase !== undefined;
  }

  getClient(): SupabaseClient {
    if (!this._supabase) {
      this.logger.error('Attempted to get Supabase client, but it is not initialized.');
      throw new InternalServerErrorException('Supabase client is not available. Initialization might have failed or is not complete.');
    }
    return this._supabase;
  }

  getServiceClient(): SupabaseClient {
    if (!this._supabaseService) {
      this.logger.warn('Service role client not available. Falling back to anon client which is subject to RLS!');
      return this.getClient();
    }
    return this._supabaseService;
  }
}
