import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConcurrencyConflict, ReferentialIntegrityError } from '../common/errors/catalog.errors';
import { stableHash } from '../common/utils/stable-hash';
import { CATALOG_STORE } from './catalog.constants';
import { RowReport, toRowError } from './catalog-sync.service';
import { CatalogEventsService } from './events/catalog-events.service';
import { FacetSerializer } from './facets/facet-serializer';
import { CategoryReconcilerService } from './reconciliation/category-reconciler.service';
import { CatalogStore } from './store/catalog-store.interface';
import { ProductWorkspace } from './workspace/product-workspace';
import { ProductWorkspaceFactory } from './workspace/product-workspace.factory';

export interface CategoryProductsChange {
    add?: string[];
    remove?: string[];
}

export interface MembershipTransferReport {
    categoryId: string;
    added: number;
    removed: number;
    unchanged: number;
    failed: number;
    rows: RowReport[];
}

/**
 * Membership edits that come from the category side (the transfer list) or replace a
 * product's categories outright. Each product is still its own change set, and its
 * categories facet is regenerated so the next facet save starts from the truth.
 */
@Injectable()
export class CategoryMembershipService {
    private readonly logger = new Logger(CategoryMembershipService.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly store: CatalogStore,
        private readonly workspaces: ProductWorkspaceFactory,
        private readonly categoryReconciler: CategoryReconcilerService,
        private readonly serializer: FacetSerializer,
        private readonly catalogEvents: CatalogEventsService,
    ) {}

    async updateCategoryProducts(categoryId: string, change: CategoryProductsChange, actor: string | null): Promise<MembershipTransferReport> {
        const categories = await this.store.loadCategories();
        if (!categories.some((category) => category.Id === categoryId)) {
            throw new ReferentialIntegrityError(`Category ${categoryId} does not exist.`);
        }

        const rows: RowReport[] = [];
        let added = 0;
        let removed = 0;
        const work: Array<{ productId: string; mode: 'add' | 'remove' }> = [
            ...(change.add ?? []).map((productId) => ({ productId, mode: 'add' as const })),
            ...(change.remove ?? []).map((productId) => ({ productId, mode: 'remove' as const })),
        ];

        for (const [index, { productId, mode }] of work.entries()) {
            try {
                const ws = await this.workspaces.openExisting(productId);
                const explicit = this.explicitCategoryIds(ws);
                if (mode === 'add' && !explicit.includes(categoryId)) {
                    explicit.push(categoryId);
                } else if (mode === 'remove' && explicit.includes(categoryId)) {
                    explicit.splice(explicit.indexOf(categoryId), 1);
                } else if (mode === 'remove' && ws.memberships.has(categoryId)) {
                    ws.warnings.push(`Category ${categoryId} is implied by a subcategory of product ${productId} and stays.`);
                }
                const row = await this.commitMemberships(ws, explicit, actor, index);
                if (row.status === 'saved') {
                    if (mode === 'add') added++;
                    else removed++;
                }
                rows.push(row);
            } catch (error) {
                const rowError = toRowError(error);
                this.logger.warn(`Membership ${mode} of product ${productId} in ${categoryId} failed: ${rowError.message}`);
                rows.push({
                    operation: 'update',
                    index,
                    productId,
                    status: 'failed',
                    version: null,
                    changeSetId: null,
                    facets: {},
                    warnings: [],
                    error: rowError,
                });
            }
        }

        return {
            categoryId,
            added,
            removed,
            unchanged: rows.filter((row) => row.status === 'unchanged').length,
            failed: rows.filter((row) => row.status === 'failed').length,
            rows,
        };
    }

    /** Replaces the product's explicit categories; ancestors follow as implied memberships. */
    async setProductCategories(productId: string, categoryIds: string[], version: number, actor: string | null): Promise<RowReport> {
        const ws = await this.workspaces.openExisting(productId);
        if (ws.product.Version !== version) {
            throw new ConcurrencyConflict(productId, version, ws.product.Version);
        }
        return this.commitMemberships(ws, [...new Set(categoryIds)], actor, 0);
    }

    private explicitCategoryIds(ws: ProductWorkspace): string[] {
        return [...ws.memberships.values()].filter((membership) => membership.IsExplicit).map((membership) => membership.CategoryId);
    }

    private async commitMemberships(ws: ProductWorkspace, explicit: string[], actor: string | null, index: number): Promise<RowReport> {
        const missing = explicit.filter((id) => !ws.categories.get(id));
        if (missing.length > 0) {
            throw new ReferentialIntegrityError(`Unknown category id(s): ${missing.join(', ')}.`, [
                { facet: 'categories', message: `Categories ${missing.join(', ')} do not exist.` },
            ]);
        }

        this.categoryReconciler.applyMemberships(ws, explicit);
        if (ws.touched('ProductCategory')) {
            const facet = this.serializer.categories(ws);
            ws.patchProduct({ CategoriesJson: facet, CategoriesHash: stableHash(facet) });
        }

        const base = {
            operation: 'update' as const,
            index,
            productId: ws.productId,
            facets: { categories: 'changed' as const },
            warnings: [...ws.warnings],
        };
        if (!ws.productChanged()) {
            return { ...base, status: 'unchanged', version: ws.product.Version, changeSetId: null, facets: {} };
        }

        const changeSet = ws.toChangeSet(this.workspaces.newId(), actor);
        await this.store.commit(changeSet);
        this.logger.log(`Product ${ws.productId} categories updated (version ${ws.product.Version})`);
        await this.catalogEvents.emitChangeSetCommitted('PRODUCT_UPDATED', changeSet);
        return { ...base, status: 'saved', version: ws.product.Version, changeSetId: changeSet.Id };
    }
}
