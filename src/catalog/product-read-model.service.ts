import { Inject, Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../common/errors/catalog.errors';
import { IMAGE_STORE } from './catalog.constants';
import { ImageStore } from './collaborators/image-store.service';
import { AttributeScope } from './entities/attribute.entity';
import { FacetSerializer, SerializedFacets } from './facets/facet-serializer';
import { CompatibilityRelation } from './navigation/dependency-inference.service';
import { NavigationContext, NavigationQuery, NavigationResolverService, NavigationResult } from './navigation/navigation-resolver.service';
import { ProductStats, computeProductStats } from './product-stats';
import { MemberFilter } from './types/facet-specs.types';
import { ProductWorkspace } from './workspace/product-workspace';
import { ProductWorkspaceFactory } from './workspace/product-workspace.factory';

export interface AttributeReadModel {
    id: string;
    name: string;
    slug: string;
    scope: AttributeScope;
    options: Array<{ id: string; value: string; displayName: string; filterGroup: string; global: boolean }>;
}

export interface VariantReadModel {
    id: string;
    sku: string;
    name: string;
    purchasePrice: number | null;
    salePrice: number;
    stockQty: number;
    images: string[];
    attributes: Record<string, string>;
}

export interface GroupReadModel {
    id: string;
    name: string;
    slug: string;
    description: string;
    images: string[];
    displayImage: string | null;
    memberVariantIds: string[];
    memberFilter: MemberFilter | null;
}

export interface CategoryMembershipReadModel {
    id: string;
    name: string;
    slug: string;
    path: string;
    isExplicit: boolean;
    ancestors: Array<{ id: string; name: string; slug: string }>;
}

export interface ProductReadModel {
    id: string;
    name: string;
    slug: string;
    description: string;
    isActive: boolean;
    purchasePrice: number | null;
    salePrice: number | null;
    stockQty: number;
    images: string[];
    version: number;
    updatedAt: string;
    facets: {
        attributes_json: unknown[] | null;
        variants_json: unknown[] | null;
        groups_json: unknown[] | null;
        categories_json: unknown[] | null;
    };
    attributes: AttributeReadModel[];
    variants: VariantReadModel[];
    groups: GroupReadModel[];
    categories: CategoryMembershipReadModel[];
    stats: ProductStats;
}

export interface NavigationInput {
    context?: { groupId?: string; variantId?: string };
    overrides?: Record<string, unknown>;
}

@Injectable()
export class ProductReadModelService {
    private readonly logger = new Logger(ProductReadModelService.name);

    constructor(
        private readonly workspaces: ProductWorkspaceFactory,
        private readonly serializer: FacetSerializer,
        private readonly navigationResolver: NavigationResolverService,
        @Inject(IMAGE_STORE) private readonly imageStore: ImageStore,
    ) {}

    async getProduct(productId: string): Promise<ProductReadModel> {
        const ws = await this.workspaces.openExisting(productId);
        const { product } = ws;
        const variants = ws.activeVariants();

        return {
            id: product.Id,
            name: product.Name,
            slug: product.Slug,
            description: product.Description,
            isActive: product.IsActive,
            purchasePrice: product.PurchasePrice,
            salePrice: product.SalePrice,
            stockQty: product.StockQty,
            images: this.resolveImages(product.Images),
            version: product.Version,
            updatedAt: product.UpdatedAt,
            facets: {
                attributes_json: product.AttributesJson,
                variants_json: product.VariantsJson,
                groups_json: product.GroupsJson,
                categories_json: product.CategoriesJson,
            },
            attributes: this.attributes(ws),
            variants: variants.map((variant) => ({
                id: variant.Id,
                sku: variant.Sku,
                name: variant.Name,
                purchasePrice: variant.PurchasePrice,
                salePrice: variant.SalePrice,
                stockQty: variant.StockQty,
                images: this.resolveImages(variant.Images),
                attributes: this.attributeValues(ws, variant.Selection),
            })),
            groups: ws.activeGroups().map((group) => ({
                id: group.Id,
                name: group.Name,
                slug: group.Slug,
                description: group.Description,
                images: this.resolveImages(group.Images),
                displayImage: group.DisplayImage ? this.imageStore.resolveUrl(group.DisplayImage) : null,
                memberVariantIds: group.MemberVariantIds,
                memberFilter: group.MemberFilter,
            })),
            categories: this.categories(ws),
            stats: product.Stats ?? computeProductStats(product, variants),
        };
    }

    /** The four facets regenerated from the normalized rows. */
    async getFacets(productId: string): Promise<SerializedFacets> {
        return this.serializer.serialize(await this.workspaces.openExisting(productId));
    }

    async navigate(productId: string, input: NavigationInput): Promise<NavigationResult> {
        const query = this.toQuery(input);
        const ws = await this.workspaces.openExisting(productId);
        const result = this.navigationResolver.resolve(
            {
                types: [...ws.types.values()],
                options: [...ws.options.values()],
                variants: ws.activeVariants(),
                groups: ws.activeGroups(),
                relation: new CompatibilityRelation(ws.product.CompatibilityJson),
            },
            query,
        );
        this.logger.debug(`Navigation on product ${productId} -> ${result.resolvedTarget?.id ?? 'none'}`);
        return result;
    }

    private toQuery(input: NavigationInput): NavigationQuery {
        const groupId = input.context?.groupId;
        const variantId = input.context?.variantId;
        let context: NavigationContext;
        if (groupId !== undefined && variantId === undefined) {
            context = { groupId };
        } else if (variantId !== undefined && groupId === undefined) {
            context = { variantId };
        } else {
            throw new ValidationError('Navigation context needs exactly one of groupId or variantId.', [
                { field: 'context', message: 'Provide either groupId or variantId.' },
            ]);
        }
        const overrides: Record<string, string | null> = {};
        for (const [key, value] of Object.entries(input.overrides ?? {})) {
            if (value === null) overrides[key] = null;
            else if (typeof value === 'string' || typeof value === 'number') overrides[key] = String(value);
            else throw new ValidationError(`Override "${key}" must be a string, a number or null.`, [{ field: key, message: 'Invalid override value.' }]);
        }
        return { context, overrides };
    }

    private attributes(ws: ProductWorkspace): AttributeReadModel[] {
        const used = new Set(ws.activeVariants().flatMap((variant) => Object.values(variant.Selection)));
        return [...ws.types.values()]
            .sort((a, b) => a.DisplayOrder - b.DisplayOrder || a.Slug.localeCompare(b.Slug))
            .map((type) => ({
                id: type.Id,
                name: type.Name,
                slug: type.Slug,
                scope: type.Scope,
                options: [...ws.options.values()]
                    .filter((option) => option.AttributeTypeId === type.Id && (option.ProductId === ws.productId || used.has(option.Id)))
                    .sort((a, b) => a.DisplayOrder - b.DisplayOrder || a.Value.localeCompare(b.Value))
                    .map((option) => ({
                        id: option.Id,
                        value: option.Value,
                        displayName: option.DisplayName,
                        filterGroup: option.FilterGroup,
                        global: option.ProductId === null,
                    })),
            }))
            .filter((attribute) => attribute.options.length > 0);
    }

    private attributeValues(ws: ProductWorkspace, selection: Record<string, string>): Record<string, string> {
        const values: Record<string, string> = {};
        for (const [typeId, optionId] of Object.entries(selection)) {
            const type = ws.types.get(typeId);
            const option = ws.options.get(optionId);
            if (type && option) values[type.Slug] = option.Value;
        }
        return values;
    }

    private categories(ws: ProductWorkspace): CategoryMembershipReadModel[] {
        return [...ws.memberships.values()]
            .flatMap((membership) => {
                const category = ws.categories.get(membership.CategoryId);
                if (!category) return [];
                return [
                    {
                        id: category.Id,
                        name: category.Name,
                        slug: category.Slug,
                        path: category.Path,
                        isExplicit: membership.IsExplicit,
                        ancestors: ws.categories.ancestors(category.Id).map((node) => ({ id: node.Id, name: node.Name, slug: node.Slug })),
                    },
                ];
            })
            .sort((a, b) => a.path.localeCompare(b.path));
    }

    private resolveImages(references: string[]): string[] {
        return references.map((reference) => this.imageStore.resolveUrl(reference));
    }
}
