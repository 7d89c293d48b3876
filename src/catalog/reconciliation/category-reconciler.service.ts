import { Injectable, Logger } from '@nestjs/common';
import { CategoryCycleError, ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { slugify } from '../../common/utils/slugify';
import { Category } from '../entities/category.entity';
import { CategorySpec } from '../types/facet-specs.types';
import { ProductWorkspace } from '../workspace/product-workspace';

export interface CategoryReconcileResult {
    explicit: string[];
    implied: string[];
    added: number;
    removed: number;
}

@Injectable()
export class CategoryReconcilerService {
    private readonly logger = new Logger(CategoryReconcilerService.name);

    /** Resolves every path to its leaf node, creating missing levels, then rewrites the memberships. */
    reconcile(ws: ProductWorkspace, specs: CategorySpec[]): CategoryReconcileResult {
        const leaves = specs.map((spec) => this.resolvePath(ws, spec).Id);
        return this.applyMemberships(ws, leaves);
    }

    /**
     * Explicit memberships become exactly `leafIds`; every ancestor of a leaf is an implied
     * membership; anything else the product belonged to is removed.
     */
    applyMemberships(ws: ProductWorkspace, leafIds: string[]): CategoryReconcileResult {
        const explicit = new Set(leafIds);
        const implied = new Set<string>();
        for (const leafId of explicit) {
            for (const ancestor of ws.categories.ancestors(leafId)) {
                if (!explicit.has(ancestor.Id)) implied.add(ancestor.Id);
            }
        }

        let added = 0;
        let removed = 0;
        for (const categoryId of [...ws.memberships.keys()]) {
            if (explicit.has(categoryId) || implied.has(categoryId)) continue;
            ws.removeMembership(categoryId);
            removed++;
        }
        for (const categoryId of explicit) {
            if (!ws.memberships.has(categoryId)) added++;
            ws.putMembership(categoryId, true);
        }
        for (const categoryId of implied) {
            if (!ws.memberships.has(categoryId)) added++;
            ws.putMembership(categoryId, false);
        }

        this.logger.log(
            `Categories of product ${ws.productId}: ${explicit.size} explicit, ${implied.size} implied, +${added}/-${removed}`,
        );
        return { explicit: [...explicit], implied: [...implied], added, removed };
    }

    private resolvePath(ws: ProductWorkspace, spec: CategorySpec): Category {
        const tree = ws.categories;
        const chain = new Set<string>();
        let parent: Category | null = null;

        for (const level of spec.levels) {
            let node: Category;
            if (level.kind === 'id') {
                const found = tree.get(level.id);
                if (!found) {
                    throw new ReferentialIntegrityError(`Category ${level.id} does not exist.`, [
                        { facet: 'categories', row: spec.row, field: 'path', message: `Unknown category id ${level.id}.` },
                    ]);
                }
                if (chain.has(found.Id)) {
                    throw new CategoryCycleError(`Category path of row ${spec.row} passes through "${found.Name}" twice.`, [
                        { facet: 'categories', row: spec.row, field: 'path', message: `"${found.Name}" would become its own ancestor.` },
                    ]);
                }
                if (found.ParentId !== (parent?.Id ?? null)) {
                    throw new ReferentialIntegrityError(`Category "${found.Path}" is not a child of "${parent?.Path ?? 'the root'}".`, [
                        { facet: 'categories', row: spec.row, field: 'path', message: `"${found.Name}" sits elsewhere in the tree.` },
                    ]);
                }
                node = found;
            } else {
                const parentId: string | null = parent?.Id ?? null;
                const existing = tree.findChild(parentId, level.name, level.slug);
                node = existing
                    ? tree.reactivate(existing.Id)
                    : tree.create(level.name, level.slug ?? (slugify(level.name) || 'category'), parentId);
            }
            chain.add(node.Id);
            parent = node;
        }

        if (!parent) {
            throw new ReferentialIntegrityError(`Category row ${spec.row} names no category.`);
        }
        return parent;
    }
}
