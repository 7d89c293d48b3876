import { Inject, Injectable } from '@nestjs/common';
import { ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { CATALOG_STORE, CLOCK, Clock, ID_GENERATOR, IdGenerator } from '../catalog.constants';
import { Product } from '../entities/product.entity';
import { CatalogStore } from '../store/catalog-store.interface';
import { ProductWorkspace } from './product-workspace';

@Injectable()
export class ProductWorkspaceFactory {
    constructor(
        @Inject(CATALOG_STORE) private readonly store: CatalogStore,
        @Inject(ID_GENERATOR) private readonly generateId: IdGenerator,
        @Inject(CLOCK) private readonly clock: Clock,
    ) {}

    newId(): string {
        return this.generateId();
    }

    now(): string {
        return this.clock().toISOString();
    }

    async requireProduct(productId: string): Promise<Product> {
        const product = await this.store.getProduct(productId);
        if (!product) {
            throw new ReferentialIntegrityError(`Product ${productId} does not exist.`);
        }
        return product;
    }

    async openExisting(productId: string): Promise<ProductWorkspace> {
        return this.open(await this.requireProduct(productId), false);
    }

    /** A new product has no graph yet; it still sees the global attribute catalog and the category forest. */
    async open(product: Product, isNew: boolean): Promise<ProductWorkspace> {
        const [graph, catalog, categories] = await Promise.all([
            isNew ? Promise.resolve({ variants: [], groups: [], memberships: [] }) : this.store.loadProductGraph(product.Id),
            this.store.loadAttributeCatalog(isNew ? null : product.Id),
            this.store.loadCategories(),
        ]);
        return new ProductWorkspace({ product, isNew, graph, catalog, categories }, this.generateId, this.now());
    }
}
