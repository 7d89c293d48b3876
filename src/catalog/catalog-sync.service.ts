import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
    CatalogError,
    ConcurrencyConflict,
    FacetName,
    ReconciliationConflict,
    RowIssue,
    ValidationError,
    describeError,
} from '../common/errors/catalog.errors';
import { slugify } from '../common/utils/slugify';
import { CATALOG_STORE } from './catalog.constants';
import { Product } from './entities/product.entity';
import { CatalogEventsService } from './events/catalog-events.service';
import { FacetParser } from './facets/facet-parser';
import { DependencyInferenceService } from './navigation/dependency-inference.service';
import { computeProductStats } from './product-stats';
import { AttributeCatalogService, AttributeMapping } from './reconciliation/attribute-catalog.service';
import { CategoryReconcilerService } from './reconciliation/category-reconciler.service';
import {
    ChangeDetector,
    FACET_NAMES,
    FacetDecisions,
    FacetState,
    StoredHashes,
    needsReconciliation,
    rawFacet,
} from './reconciliation/change-detector.service';
import { GroupReconcilerService } from './reconciliation/group-reconciler.service';
import { VariantReconcilerService } from './reconciliation/variant-reconciler.service';
import { CatalogStore } from './store/catalog-store.interface';
import { ParsedFacets, RawFacets } from './types/facet-specs.types';
import { ProductWorkspace } from './workspace/product-workspace';
import { ProductWorkspaceFactory } from './workspace/product-workspace.factory';

export interface ProductFieldsInput {
    name?: string;
    slug?: string;
    description?: string;
    is_active?: boolean;
    purchase_price?: number | null;
    sale_price?: number | null;
    stock_qty?: number;
    images?: string[];
}

export interface ProductSaveInput extends ProductFieldsInput, RawFacets {}

export interface ProductUpdateInput extends ProductSaveInput {
    id: string;
    version: number;
}

export interface BulkSaveRequest {
    create?: ProductSaveInput[];
    update?: ProductUpdateInput[];
}

export type RowStatus = 'saved' | 'unchanged' | 'failed';

export interface RowError {
    code: string;
    message: string;
    issues: RowIssue[];
}

export interface RowReport {
    operation: 'create' | 'update';
    index: number;
    productId: string | null;
    status: RowStatus;
    version: number | null;
    changeSetId: string | null;
    facets: Partial<Record<FacetName, FacetState>>;
    warnings: string[];
    error?: RowError;
}

export interface BulkSaveReport {
    saved: number;
    unchanged: number;
    failed: number;
    rows: RowReport[];
}

const DEFAULT_MAX_BULK_ROWS = 500;

function storedHashes(product: Product): StoredHashes {
    return {
        attributes: product.AttributesHash,
        variants: product.VariantsHash,
        groups: product.GroupsHash,
        categories: product.CategoriesHash,
    };
}

export function toRowError(error: unknown): RowError {
    if (error instanceof CatalogError) {
        return { code: error.code, message: error.message, issues: error.issues };
    }
    return { code: 'INTERNAL_ERROR', message: describeError(error), issues: [] };
}

/**
 * Entry point of a product save. Each product is parsed, gated by the change detector,
 * reconciled in its own workspace and committed as one change set; a bulk request is
 * a sequence of such independent commits.
 */
@Injectable()
export class CatalogSyncService {
    private readonly logger = new Logger(CatalogSyncService.name);
    private readonly maxBulkRows: number;

    constructor(
        @Inject(CATALOG_STORE) private readonly store: CatalogStore,
        private readonly workspaces: ProductWorkspaceFactory,
        private readonly facetParser: FacetParser,
        private readonly changeDetector: ChangeDetector,
        private readonly attributeCatalog: AttributeCatalogService,
        private readonly variantReconciler: VariantReconcilerService,
        private readonly groupReconciler: GroupReconcilerService,
        private readonly categoryReconciler: CategoryReconcilerService,
        private readonly dependencyInference: DependencyInferenceService,
        private readonly catalogEvents: CatalogEventsService,
        configService: ConfigService,
    ) {
        this.maxBulkRows = Number(configService.get<string>('CATALOG_MAX_BULK_ROWS')) || DEFAULT_MAX_BULK_ROWS;
    }

    /** Per-row report; a failing product never affects the others. */
    async saveProducts(request: BulkSaveRequest, actor: string | null): Promise<BulkSaveReport> {
        const creates = request.create ?? [];
        const updates = request.update ?? [];
        if (creates.length + updates.length > this.maxBulkRows) {
            throw new ValidationError(`A bulk save takes at most ${this.maxBulkRows} products, got ${creates.length + updates.length}.`);
        }

        const rows: RowReport[] = [];
        for (const [index, input] of creates.entries()) {
            rows.push(await this.guard('create', index, null, () => this.createProduct(input, actor)));
        }
        for (const [index, input] of updates.entries()) {
            rows.push(await this.guard('update', index, input.id, () => this.updateProduct(input, actor)));
        }

        const report: BulkSaveReport = {
            saved: rows.filter((row) => row.status === 'saved').length,
            unchanged: rows.filter((row) => row.status === 'unchanged').length,
            failed: rows.filter((row) => row.status === 'failed').length,
            rows,
        };
        this.logger.log(`Bulk save: ${report.saved} saved, ${report.unchanged} unchanged, ${report.failed} failed`);
        return report;
    }

    async createProduct(input: ProductSaveInput, actor: string | null): Promise<RowReport> {
        const name = input.name?.trim();
        if (!name) {
            throw new ValidationError('A new product needs a name.', [{ field: 'name', message: 'Name is required.' }]);
        }
        const parsed = this.facetParser.parse(input);

        const now = this.workspaces.now();
        const product: Product = {
            Id: this.workspaces.newId(),
            Name: name,
            Slug: await this.availableSlug(slugify(input.slug ?? name) || 'product'),
            Description: input.description ?? '',
            IsActive: input.is_active ?? true,
            PurchasePrice: input.purchase_price ?? null,
            SalePrice: input.sale_price ?? null,
            StockQty: input.stock_qty ?? 0,
            Images: input.images ?? [],
            AttributesJson: null,
            VariantsJson: null,
            GroupsJson: null,
            CategoriesJson: null,
            AttributesHash: null,
            VariantsHash: null,
            GroupsHash: null,
            CategoriesHash: null,
            CompatibilityJson: [],
            Stats: null,
            Version: 0,
            CreatedAt: now,
            UpdatedAt: now,
        };
        return this.reconcileAndCommit('create', product, true, input, parsed, actor);
    }

    async updateProduct(input: ProductUpdateInput, actor: string | null): Promise<RowReport> {
        const parsed = this.facetParser.parse(input);
        const product = await this.workspaces.requireProduct(input.id);
        if (product.Version !== input.version) {
            throw new ConcurrencyConflict(product.Id, input.version, product.Version);
        }
        return this.reconcileAndCommit('update', product, false, input, parsed, actor);
    }

    private async reconcileAndCommit(
        operation: RowReport['operation'],
        product: Product,
        isNew: boolean,
        input: ProductSaveInput,
        parsed: ParsedFacets,
        actor: string | null,
    ): Promise<RowReport> {
        const decisions = this.changeDetector.detect(input, storedHashes(product));
        if (needsReconciliation(decisions.variants) && product.GroupsJson !== null) {
            this.changeDetector.markDependent(decisions, 'groups');
        }

        const ws = await this.workspaces.open(product, isNew);
        if (!isNew) await this.applyFields(ws, input);

        this.reconcileFacets(ws, decisions, parsed, product);
        this.storeFacets(ws, input, decisions);

        const activeVariants = ws.activeVariants();
        ws.patchProduct({
            CompatibilityJson: this.dependencyInference.infer(activeVariants),
            Stats: computeProductStats(ws.product, activeVariants),
        });

        const facets = this.facetStates(decisions);
        if (!isNew && !ws.productChanged()) {
            this.logger.debug(`Product ${product.Id} unchanged, nothing to commit`);
            return this.report(operation, ws, 'unchanged', null, facets);
        }

        const changeSet = ws.toChangeSet(this.workspaces.newId(), actor);
        try {
            await this.store.commit(changeSet);
        } catch (error) {
            this.logger.error(`Commit of change set ${changeSet.Id} for product ${product.Id} failed: ${describeError(error)}`);
            throw error;
        }
        this.logger.log(`Product ${product.Id} saved as version ${ws.product.Version} (${changeSet.Entries.length} entries)`);
        await this.catalogEvents.emitChangeSetCommitted(isNew ? 'PRODUCT_CREATED' : 'PRODUCT_UPDATED', changeSet);
        return this.report(operation, ws, 'saved', changeSet.Id, facets);
    }

    private reconcileFacets(ws: ProductWorkspace, decisions: FacetDecisions, parsed: ParsedFacets, stored: Product): void {
        let mapping: AttributeMapping | null = null;
        if (needsReconciliation(decisions.attributes)) {
            mapping = this.attributeCatalog.reconcile(ws, parsed.attributes ?? []);
        }
        if (needsReconciliation(decisions.variants)) {
            this.variantReconciler.reconcile(ws, parsed.variants ?? []);
        }
        if (mapping) {
            this.attributeCatalog.pruneUnlisted(ws, mapping);
        }
        if (decisions.groups.reason === 'dependency') {
            const replay = this.facetParser.parse({ groups_json: stored.GroupsJson });
            this.groupReconciler.reconcile(ws, replay.groups ?? [], 'dependency');
        } else if (needsReconciliation(decisions.groups)) {
            this.groupReconciler.reconcile(ws, parsed.groups ?? [], 'strict');
        }
        if (needsReconciliation(decisions.categories)) {
            this.categoryReconciler.reconcile(ws, parsed.categories ?? []);
        }
    }

    /** Changed facets are stored as sent, together with the hash the next save compares against. */
    private storeFacets(ws: ProductWorkspace, input: RawFacets, decisions: FacetDecisions): void {
        for (const facet of FACET_NAMES) {
            const decision = decisions[facet];
            if (decision.state === 'unchanged') continue;
            const raw = rawFacet(input, facet);
            const stored = Array.isArray(raw) ? raw : [];
            switch (facet) {
                case 'attributes':
                    ws.patchProduct({ AttributesJson: stored, AttributesHash: decision.hash });
                    break;
                case 'variants':
                    ws.patchProduct({ VariantsJson: stored, VariantsHash: decision.hash });
                    break;
                case 'groups':
                    ws.patchProduct({ GroupsJson: stored, GroupsHash: decision.hash });
                    break;
                case 'categories':
                    ws.patchProduct({ CategoriesJson: stored, CategoriesHash: decision.hash });
                    break;
            }
        }
    }

    private async applyFields(ws: ProductWorkspace, input: ProductFieldsInput): Promise<void> {
        const patch: Partial<Product> = {};
        if (input.name !== undefined && input.name.trim()) patch.Name = input.name.trim();
        if (input.description !== undefined) patch.Description = input.description;
        if (input.is_active !== undefined) patch.IsActive = input.is_active;
        if (input.purchase_price !== undefined) patch.PurchasePrice = input.purchase_price;
        if (input.sale_price !== undefined) patch.SalePrice = input.sale_price;
        if (input.stock_qty !== undefined) patch.StockQty = input.stock_qty;
        if (input.images !== undefined) patch.Images = input.images;
        if (input.slug !== undefined) {
            const slug = slugify(input.slug);
            if (slug && slug !== ws.product.Slug) {
                if (await this.store.isProductSlugTaken(slug)) {
                    throw new ReconciliationConflict(`Product slug "${slug}" is already in use.`, [
                        { field: 'slug', message: `"${slug}" belongs to another product.` },
                    ]);
                }
                patch.Slug = slug;
            }
        }
        ws.patchProduct(patch);
    }

    private async availableSlug(base: string): Promise<string> {
        let candidate = base;
        for (let counter = 1; await this.store.isProductSlugTaken(candidate); counter++) {
            candidate = `${base}-${counter}`;
        }
        return candidate;
    }

    private facetStates(decisions: FacetDecisions): Partial<Record<FacetName, FacetState>> {
        const states: Partial<Record<FacetName, FacetState>> = {};
        for (const facet of FACET_NAMES) {
            if (decisions[facet].reason !== 'omitted') states[facet] = decisions[facet].state;
        }
        return states;
    }

    private report(
        operation: RowReport['operation'],
        ws: ProductWorkspace,
        status: RowStatus,
        changeSetId: string | null,
        facets: Partial<Record<FacetName, FacetState>>,
    ): RowReport {
        return {
            operation,
            index: 0,
            productId: ws.productId,
            status,
            version: ws.product.Version,
            changeSetId,
            facets,
            warnings: [...ws.warnings],
        };
    }

    private async guard(
        operation: RowReport['operation'],
        index: number,
        productId: string | null,
        run: () => Promise<RowReport>,
    ): Promise<RowReport> {
        try {
            return { ...(await run()), index };
        } catch (error) {
            const rowError = toRowError(error);
            if (error instanceof CatalogError) {
                this.logger.warn(`${operation} row ${index} rejected (${rowError.code}): ${rowError.message}`);
            } else {
                this.logger.error(`${operation} row ${index} failed: ${rowError.message}`);
            }
            return {
                operation,
                index,
                productId,
                status: 'failed',
                version: null,
                changeSetId: null,
                facets: {},
                warnings: [],
                error: rowError,
            };
        }
    }
}
