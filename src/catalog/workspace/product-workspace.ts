import { canonicalJson } from '../../common/utils/stable-hash';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Category, ProductCategory, productCategoryId } from '../entities/category.entity';
import { CatalogChangeSet, CatalogEntityName, PriceTransition } from '../entities/change-set.entity';
import { Product } from '../entities/product.entity';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';
import { AttributeCatalogRows, ProductGraph } from '../store/catalog-store.interface';
import { IdGenerator } from '../catalog.constants';
import { CategoryTree } from './category-tree';
import { ChangeRecorder } from './change-recorder';

export interface WorkspaceSeed {
    product: Product;
    isNew: boolean;
    graph: ProductGraph;
    catalog: AttributeCatalogRows;
    categories: Category[];
}

const byId = <T extends { Id: string }>(a: T, b: T): number => (a.Id < b.Id ? -1 : a.Id > b.Id ? 1 : 0);

/**
 * In-memory unit of work for one product save. Reconcilers read and mutate the
 * working copy through this class; every mutation lands in the recorder, and
 * toChangeSet() turns the net effect into the single atomic commit for the product.
 */
export class ProductWorkspace {
    readonly recorder = new ChangeRecorder();
    readonly categories: CategoryTree;
    readonly types = new Map<string, AttributeType>();
    readonly options = new Map<string, AttributeOption>();
    readonly variants = new Map<string, Variant>();
    readonly groups = new Map<string, VariantGroup>();
    readonly memberships = new Map<string, ProductCategory>(); // keyed by CategoryId
    readonly warnings: string[] = [];
    readonly priceTransitions: PriceTransition[] = [];
    readonly isNew: boolean;

    private current: Product;
    private readonly original: Product;

    constructor(seed: WorkspaceSeed, private readonly generateId: IdGenerator, readonly now: string) {
        this.isNew = seed.isNew;
        this.original = seed.product;
        this.current = { ...seed.product };
        seed.catalog.types.forEach((type) => this.types.set(type.Id, type));
        seed.catalog.options.forEach((option) => this.options.set(option.Id, option));
        seed.graph.variants.filter((variant) => variant.IsActive).forEach((variant) => this.variants.set(variant.Id, variant));
        seed.graph.groups.filter((group) => group.IsActive).forEach((group) => this.groups.set(group.Id, group));
        seed.graph.memberships.forEach((membership) => this.memberships.set(membership.CategoryId, membership));
        this.categories = new CategoryTree(seed.categories, this.recorder, () => this.newId(), now);
    }

    get product(): Product {
        return this.current;
    }

    get productId(): string {
        return this.current.Id;
    }

    newId(): string {
        return this.generateId();
    }

    patchProduct(patch: Partial<Product>): void {
        this.current = { ...this.current, ...patch };
    }

    touched(entity: CatalogEntityName): boolean {
        return this.recorder.countOf(entity) > 0;
    }

    // Attribute catalog

    addType(type: AttributeType): void {
        this.types.set(type.Id, type);
        this.recorder.record('AttributeType', 'create', type.Id, null, type);
    }

    addOption(option: AttributeOption): void {
        this.options.set(option.Id, option);
        this.recorder.record('AttributeOption', 'create', option.Id, null, option);
    }

    deleteOption(id: string): void {
        const option = this.options.get(id);
        if (!option) return;
        this.options.delete(id);
        this.recorder.record('AttributeOption', 'delete', id, option, null);
    }

    // Variants

    activeVariants(): Variant[] {
        return [...this.variants.values()].sort(byId);
    }

    putVariant(next: Variant): void {
        const before = this.variants.get(next.Id) ?? null;
        this.variants.set(next.Id, next);
        this.recorder.record('Variant', before ? 'update' : 'create', next.Id, before, next);
    }

    retireVariant(id: string): void {
        const before = this.variants.get(id);
        if (!before) return;
        this.variants.delete(id);
        this.recorder.record('Variant', 'retire', id, before, { ...before, IsActive: false, RetiredAt: this.now, UpdatedAt: this.now });
    }

    // Groups

    activeGroups(): VariantGroup[] {
        return [...this.groups.values()].sort(byId);
    }

    putGroup(next: VariantGroup): void {
        const before = this.groups.get(next.Id) ?? null;
        this.groups.set(next.Id, next);
        this.recorder.record('VariantGroup', before ? 'update' : 'create', next.Id, before, next);
    }

    retireGroup(id: string): void {
        const before = this.groups.get(id);
        if (!before) return;
        this.groups.delete(id);
        this.recorder.record('VariantGroup', 'retire', id, before, { ...before, IsActive: false, RetiredAt: this.now, UpdatedAt: this.now });
    }

    // Category memberships

    putMembership(categoryId: string, isExplicit: boolean): void {
        const before = this.memberships.get(categoryId) ?? null;
        const next: ProductCategory = {
            Id: productCategoryId(this.productId, categoryId),
            ProductId: this.productId,
            CategoryId: categoryId,
            IsExplicit: isExplicit,
        };
        this.memberships.set(categoryId, next);
        this.recorder.record('ProductCategory', before ? 'update' : 'create', next.Id, before, next);
    }

    removeMembership(categoryId: string): void {
        const before = this.memberships.get(categoryId);
        if (!before) return;
        this.memberships.delete(categoryId);
        this.recorder.record('ProductCategory', 'delete', before.Id, before, null);
    }

    /** Number of row writes this save would perform, the product row included. */
    writeCount(): number {
        return this.recorder.count() + (this.productChanged() ? 1 : 0);
    }

    productChanged(): boolean {
        return this.isNew || this.recorder.count() > 0 || canonicalJson(this.current) !== canonicalJson(this.original);
    }

    toChangeSet(transactionId: string, actor: string | null): CatalogChangeSet {
        if (this.isNew) {
            const created: Product = { ...this.current, Version: 1, CreatedAt: this.now, UpdatedAt: this.now };
            this.current = created;
            this.recorder.record('Product', 'create', created.Id, null, created);
        } else if (this.productChanged()) {
            const updated: Product = { ...this.current, Version: this.original.Version + 1, UpdatedAt: this.now };
            this.current = updated;
            this.recorder.record('Product', 'update', updated.Id, this.original, updated);
        }
        return {
            Id: transactionId,
            ProductId: this.productId,
            ExpectedVersion: this.isNew ? null : this.original.Version,
            ExpectedProductVersions: {},
            Actor: actor,
            Entries: this.recorder.entries(),
            PriceTransitions: [...this.priceTransitions],
            CreatedAt: this.now,
        };
    }
}
