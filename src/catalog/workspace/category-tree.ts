import { CategoryCycleError, ReconciliationConflict, ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { normalizeValue, slugify } from '../../common/utils/slugify';
import { Category } from '../entities/category.entity';
import { ChangeRecorder } from './change-recorder';

export const PATH_SEPARATOR = ' > ';

/**
 * The shared category forest, addressed by id with parent pointers. Nodes are identified
 * by (Slug, ParentId): "Tinta" under "Pintura" and "Tinta" under "Construção" are two
 * different nodes. Every mutation is written to the recorder and refreshes the
 * materialized Path/PathIds of the affected subtree.
 */
export class CategoryTree {
    private readonly nodes = new Map<string, Category>();
    private readonly childIndex = new Map<string | null, Set<string>>();

    constructor(
        categories: Category[],
        private readonly recorder: ChangeRecorder,
        private readonly newId: () => string,
        private readonly now: string,
    ) {
        for (const category of categories) {
            this.index(category);
        }
    }

    get(id: string): Category | undefined {
        return this.nodes.get(id);
    }

    all(): Category[] {
        return [...this.nodes.values()];
    }

    children(parentId: string | null): Category[] {
        const ids = this.childIndex.get(parentId) ?? new Set<string>();
        return [...ids].flatMap((id) => {
            const node = this.nodes.get(id);
            return node ? [node] : [];
        });
    }

    /** Child of `parentId` whose slug matches, falling back to a case-insensitive name match. */
    findChild(parentId: string | null, name: string, slug?: string): Category | undefined {
        const siblings = this.children(parentId);
        const wantedSlug = slug ?? slugify(name);
        return (
            siblings.find((node) => node.Slug === wantedSlug) ??
            siblings.find((node) => normalizeValue(node.Name) === normalizeValue(name))
        );
    }

    /** Ancestors from the root down to the direct parent. */
    ancestors(id: string): Category[] {
        const chain: Category[] = [];
        const seen = new Set<string>([id]);
        let parentId = this.nodes.get(id)?.ParentId ?? null;
        while (parentId) {
            if (seen.has(parentId)) {
                throw new CategoryCycleError(`Category ${id} is its own ancestor.`);
            }
            seen.add(parentId);
            const parent = this.nodes.get(parentId);
            if (!parent) break;
            chain.unshift(parent);
            parentId = parent.ParentId;
        }
        return chain;
    }

    descendants(id: string): Category[] {
        const result: Category[] = [];
        const stack = [...this.children(id)];
        while (stack.length > 0) {
            const node = stack.pop();
            if (!node) break;
            result.push(node);
            stack.push(...this.children(node.Id));
        }
        return result;
    }

    create(name: string, slug: string, parentId: string | null): Category {
        const parent = parentId ? this.nodes.get(parentId) : undefined;
        const id = this.newId();
        const category: Category = {
            Id: id,
            Name: name,
            Slug: slug,
            ParentId: parentId,
            Path: parent ? `${parent.Path}${PATH_SEPARATOR}${name}` : name,
            PathIds: parent ? [...parent.PathIds, id] : [id],
            IsActive: true,
            CreatedAt: this.now,
            UpdatedAt: this.now,
        };
        this.index(category);
        this.recorder.record('Category', 'create', id, null, category);
        return category;
    }

    rename(id: string, name: string): Category {
        const node = this.require(id);
        if (node.Name === name) return node;
        this.write(node, { ...node, Name: name, UpdatedAt: this.now });
        this.refreshPaths(id);
        return this.require(id);
    }

    /** Re-parents a node. Fails when the new parent is the node itself or one of its descendants. */
    move(id: string, newParentId: string | null): Category {
        const node = this.require(id);
        if (node.ParentId === newParentId) return node;
        if (newParentId !== null) {
            this.require(newParentId);
            if (newParentId === id || this.descendants(id).some((child) => child.Id === newParentId)) {
                throw new CategoryCycleError(`Moving "${node.Path}" under this parent would make it its own ancestor.`, [
                    { facet: 'categories', field: 'parent_id', message: `Category ${newParentId} is inside ${id}.` },
                ]);
            }
        }
        const clash = this.children(newParentId).find((sibling) => sibling.Slug === node.Slug);
        if (clash) {
            throw new ReconciliationConflict(`A category with slug "${node.Slug}" already exists under the target parent.`);
        }
        this.unindex(node);
        const moved: Category = { ...node, ParentId: newParentId, UpdatedAt: this.now };
        this.index(moved);
        this.recorder.record('Category', 'update', id, node, moved);
        this.refreshPaths(id);
        return this.require(id);
    }

    reactivate(id: string): Category {
        const node = this.require(id);
        if (node.IsActive) return node;
        this.write(node, { ...node, IsActive: true, UpdatedAt: this.now });
        return this.require(id);
    }

    /** Hard delete of a leaf node; callers make sure nothing references it. */
    remove(id: string): void {
        const node = this.require(id);
        if (this.children(id).length > 0) {
            throw new ReferentialIntegrityError(`Category "${node.Path}" still has child categories.`);
        }
        this.unindex(node);
        this.nodes.delete(id);
        this.recorder.record('Category', 'delete', id, node, null);
    }

    private refreshPaths(rootId: string): void {
        for (const node of [this.require(rootId), ...this.descendants(rootId)]) {
            const parent = node.ParentId ? this.nodes.get(node.ParentId) : undefined;
            const Path = parent ? `${parent.Path}${PATH_SEPARATOR}${node.Name}` : node.Name;
            const PathIds = parent ? [...parent.PathIds, node.Id] : [node.Id];
            if (Path !== node.Path || PathIds.join() !== node.PathIds.join()) {
                this.write(node, { ...node, Path, PathIds, UpdatedAt: this.now });
            }
        }
    }

    private write(before: Category, after: Category): void {
        this.nodes.set(after.Id, after);
        this.recorder.record('Category', 'update', after.Id, before, after);
    }

    private require(id: string): Category {
        const node = this.nodes.get(id);
        if (!node) {
            throw new ReferentialIntegrityError(`Category ${id} does not exist.`);
        }
        return node;
    }

    private index(category: Category): void {
        this.nodes.set(category.Id, category);
        const siblings = this.childIndex.get(category.ParentId) ?? new Set<string>();
        siblings.add(category.Id);
        this.childIndex.set(category.ParentId, siblings);
    }

    private unindex(category: Category): void {
        this.childIndex.get(category.ParentId)?.delete(category.Id);
    }
}
