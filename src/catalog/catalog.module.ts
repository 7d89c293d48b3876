import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v7 as uuidv7 } from 'uuid';
import { CommonModule } from '../common/common.module';
import { SupabaseService } from '../common/supabase.service';
import { CatalogController } from './catalog.controller';
import { CATALOG_STORE, CLOCK, Clock, ID_GENERATOR, IdGenerator, IMAGE_STORE } from './catalog.constants';
import { CatalogSyncService } from './catalog-sync.service';
import { CategoryMembershipService } from './category-membership.service';
import { CategoryTreeService } from './category-tree.service';
import { ConfiguredImageStore } from './collaborators/image-store.service';
import { PriceHistoryService } from './collaborators/price-history.service';
import { CatalogEventListenersService } from './events/catalog-event-listeners.service';
import { CatalogEventsService } from './events/catalog-events.service';
import { FacetParser } from './facets/facet-parser';
import { FacetSerializer } from './facets/facet-serializer';
import { DependencyInferenceService } from './navigation/dependency-inference.service';
import { NavigationResolverService } from './navigation/navigation-resolver.service';
import { ProductReadModelService } from './product-read-model.service';
import { AttributeCatalogService } from './reconciliation/attribute-catalog.service';
import { CategoryReconcilerService } from './reconciliation/category-reconciler.service';
import { ChangeDetector } from './reconciliation/change-detector.service';
import { GroupReconcilerService } from './reconciliation/group-reconciler.service';
import { VariantReconcilerService } from './reconciliation/variant-reconciler.service';
import { CatalogStore } from './store/catalog-store.interface';
import { InMemoryCatalogStore } from './store/in-memory-catalog.store';
import { SupabaseCatalogStore } from './store/supabase-catalog.store';
import { ProductWorkspaceFactory } from './workspace/product-workspace.factory';

@Module({
    imports: [CommonModule],
    controllers: [CatalogController],
    providers: [
        {
            provide: CATALOG_STORE,
            useFactory: (configService: ConfigService, supabaseService: SupabaseService): CatalogStore => {
                const backend = configService.get<string>('CATALOG_STORE') ?? 'supabase';
                if (backend === 'memory') {
                    new Logger('CatalogModule').warn('CATALOG_STORE=memory: catalog data lives in this process only.');
                    return new InMemoryCatalogStore();
                }
                return new SupabaseCatalogStore(supabaseService);
            },
            inject: [ConfigService, SupabaseService],
        },
        { provide: ID_GENERATOR, useValue: ((): string => uuidv7()) satisfies IdGenerator },
        { provide: CLOCK, useValue: ((): Date => new Date()) satisfies Clock },
        { provide: IMAGE_STORE, useClass: ConfiguredImageStore },
        ProductWorkspaceFactory,
        FacetParser,
        FacetSerializer,
        ChangeDetector,
        AttributeCatalogService,
        VariantReconcilerService,
        GroupReconcilerService,
        CategoryReconcilerService,
        DependencyInferenceService,
        NavigationResolverService,
        CatalogEventsService,
        CatalogEventListenersService,
        PriceHistoryService,
        CatalogSyncService,
        ProductReadModelService,
        CategoryMembershipService,
        CategoryTreeService,
    ],
    exports: [CatalogSyncService, ProductReadModelService, CategoryTreeService],
})
export class CatalogModule {}
