import { Inject, Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../common/errors/catalog.errors';
import { normalizeValue } from '../common/utils/slugify';
import { canonicalJson, stableHash } from '../common/utils/stable-hash';
import { CATALOG_STORE } from './catalog.constants';
import { Category, ProductCategory, productCategoryId } from './entities/category.entity';
import { CatalogChangeSet } from './entities/change-set.entity';
import { CatalogEventsService } from './events/catalog-events.service';
import { FacetSerializer } from './facets/facet-serializer';
import { CatalogStore } from './store/catalog-store.interface';
import { CategoryTree } from './workspace/category-tree';
import { ChangeRecorder } from './workspace/change-recorder';
import { ProductWorkspaceFactory } from './workspace/product-workspace.factory';

export interface CategoryTreeNode {
    id: string;
    name: string;
    slug: string;
    parentId: string | null;
    path: string;
    level: number;
    hasChildren: boolean;
    productCount: number;
    isActive: boolean;
}

export interface CategoryUpdate {
    name?: string;
    parentId?: string | null; // null moves the node to the root
}

/**
 * Tree-wide operations on the shared category forest. They run outside any single
 * product, so their change sets carry no product id; products whose implied memberships
 * or category facet shift with the edit are rewritten in the same change set, guarded
 * by the versions they were read at.
 */
@Injectable()
export class CategoryTreeService {
    private readonly logger = new Logger(CategoryTreeService.name);

    constructor(
        @Inject(CATALOG_STORE) private readonly store: CatalogStore,
        private readonly workspaces: ProductWorkspaceFactory,
        private readonly serializer: FacetSerializer,
        private readonly catalogEvents: CatalogEventsService,
    ) {}

    /** Depth-first flatten, siblings by name. A search keeps matching nodes and their ancestors. */
    async listTree(search?: string): Promise<CategoryTreeNode[]> {
        const [categories, counts] = await Promise.all([this.store.loadCategories(), this.store.countCategoryMemberships()]);
        const tree = new CategoryTree(categories, new ChangeRecorder(), () => this.workspaces.newId(), this.workspaces.now());

        let visible: Set<string> | null = null;
        const needle = search ? normalizeValue(search) : '';
        if (needle) {
            visible = new Set<string>();
            for (const node of tree.all()) {
                if (!normalizeValue(node.Name).includes(needle)) continue;
                node.PathIds.forEach((id) => visible?.add(id));
            }
        }

        const nodes: CategoryTreeNode[] = [];
        const walk = (parentId: string | null, level: number): void => {
            const children = tree.children(parentId).sort((a, b) => a.Name.localeCompare(b.Name) || a.Slug.localeCompare(b.Slug));
            for (const node of children) {
                if (visible && !visible.has(node.Id)) continue;
                const grandchildren = tree.children(node.Id);
                nodes.push({
                    id: node.Id,
                    name: node.Name,
                    slug: node.Slug,
                    parentId: node.ParentId,
                    path: node.Path,
                    level,
                    hasChildren: grandchildren.length > 0,
                    productCount: counts.get(node.Id) ?? 0,
                    isActive: node.IsActive,
                });
                walk(node.Id, level + 1);
            }
        };
        walk(null, 0);
        return nodes;
    }

    async updateCategory(categoryId: string, update: CategoryUpdate, actor: string | null): Promise<Category> {
        if (update.name === undefined && update.parentId === undefined) {
            throw new ValidationError('Nothing to update: send name and/or parentId.');
        }
        const recorder = new ChangeRecorder();
        const now = this.workspaces.now();
        const tree = new CategoryTree(await this.store.loadCategories(), recorder, () => this.workspaces.newId(), now);

        if (update.name !== undefined) {
            const name = update.name.trim();
            if (!name) throw new ValidationError('Category name cannot be empty.', [{ field: 'name', message: 'Name is required.' }]);
            tree.rename(categoryId, name);
        }
        if (update.parentId !== undefined) {
            tree.move(categoryId, update.parentId);
        }

        if (recorder.count() > 0) {
            const expectedVersions = await this.resyncProducts(
                tree,
                recorder,
                [categoryId, ...tree.descendants(categoryId).map((node) => node.Id)],
                now,
            );
            await this.commit(recorder, actor, now, expectedVersions);
        }
        const updated = tree.get(categoryId);
        if (!updated) throw new ValidationError(`Category ${categoryId} vanished during the update.`);
        this.logger.log(`Category ${categoryId} is now "${updated.Path}"`);
        return updated;
    }

    /** Deletes categories that no product belongs to and that have no children left, leaves first. */
    async pruneOrphans(actor: string | null = null): Promise<number> {
        const [categories, counts] = await Promise.all([this.store.loadCategories(), this.store.countCategoryMemberships()]);
        const recorder = new ChangeRecorder();
        const now = this.workspaces.now();
        const tree = new CategoryTree(categories, recorder, () => this.workspaces.newId(), now);

        let removed = 0;
        const deepestFirst = [...tree.all()].sort((a, b) => b.PathIds.length - a.PathIds.length);
        for (const node of deepestFirst) {
            if ((counts.get(node.Id) ?? 0) > 0 || tree.children(node.Id).length > 0) continue;
            tree.remove(node.Id);
            removed++;
        }
        if (removed > 0) {
            await this.commit(recorder, actor, now);
        }
        this.logger.log(`Pruned ${removed} orphan categor${removed === 1 ? 'y' : 'ies'}`);
        return removed;
    }

    /**
     * Re-derives implied memberships and the categories facet of every product that
     * belongs to one of `categoryIds`, writing the differences into `recorder`. Returns the
     * version each rewritten product was read at, for the store to check on commit.
     */
    private async resyncProducts(
        tree: CategoryTree,
        recorder: ChangeRecorder,
        categoryIds: string[],
        now: string,
    ): Promise<Record<string, number>> {
        const expectedVersions: Record<string, number> = {};
        const affected = new Set((await this.store.loadMembershipsOfCategories(categoryIds)).map((membership) => membership.ProductId));
        for (const productId of affected) {
            const product = await this.workspaces.requireProduct(productId);
            const current = (await this.store.loadProductGraph(productId)).memberships;
            const explicit = current.filter((membership) => membership.IsExplicit).map((membership) => membership.CategoryId);

            const next = new Map<string, ProductCategory>();
            const link = (categoryId: string, isExplicit: boolean): void => {
                if (next.get(categoryId)?.IsExplicit) return;
                next.set(categoryId, { Id: productCategoryId(productId, categoryId), ProductId: productId, CategoryId: categoryId, IsExplicit: isExplicit });
            };
            for (const leafId of explicit) {
                link(leafId, true);
                tree.ancestors(leafId).forEach((ancestor) => link(ancestor.Id, false));
            }

            const before = recorder.count();
            for (const membership of current) {
                const replacement = next.get(membership.CategoryId);
                if (!replacement) recorder.record('ProductCategory', 'delete', membership.Id, membership, null);
                else recorder.record('ProductCategory', 'update', membership.Id, membership, replacement);
            }
            const existing = new Set(current.map((membership) => membership.CategoryId));
            next.forEach((membership, categoryId) => {
                if (!existing.has(categoryId)) recorder.record('ProductCategory', 'create', membership.Id, null, membership);
            });

            const facet = this.serializer.categories({ memberships: next, categories: tree });
            const facetChanged = canonicalJson(facet) !== canonicalJson(product.CategoriesJson);
            if (recorder.count() === before && !facetChanged) continue;
            expectedVersions[productId] = product.Version;
            recorder.record('Product', 'update', productId, product, {
                ...product,
                CategoriesJson: facet,
                CategoriesHash: stableHash(facet),
                Version: product.Version + 1,
                UpdatedAt: now,
            });
        }
        if (affected.size > 0) this.logger.debug(`Re-synced category memberships of ${affected.size} product(s)`);
        return expectedVersions;
    }

    private async commit(
        recorder: ChangeRecorder,
        actor: string | null,
        now: string,
        expectedVersions: Record<string, number> = {},
    ): Promise<void> {
        const changeSet: CatalogChangeSet = {
            Id: this.workspaces.newId(),
            ProductId: null,
            ExpectedVersion: null,
            ExpectedProductVersions: expectedVersions,
            Actor: actor,
            Entries: recorder.entries(),
            PriceTransitions: [],
            CreatedAt: now,
        };
        await this.store.commit(changeSet);
        await this.catalogEvents.emitChangeSetCommitted('CATEGORY_TREE_UPDATED', changeSet);
    }
}
