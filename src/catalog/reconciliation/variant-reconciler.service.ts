import { Injectable, Logger } from '@nestjs/common';
import { ReconciliationConflict, RowIssue } from '../../common/errors/catalog.errors';
import { canonicalJson } from '../../common/utils/stable-hash';
import { slugify, uniqueSlug } from '../../common/utils/slugify';
import { AttributeOption } from '../entities/attribute.entity';
import { PriceTransition } from '../entities/change-set.entity';
import { Variant } from '../entities/variant.entity';
import { VariantSpec } from '../types/facet-specs.types';
import { ProductWorkspace } from '../workspace/product-workspace';
import { AttributeCatalogService } from './attribute-catalog.service';

export interface VariantReconcileResult {
    created: number;
    updated: number;
    retired: number;
}

interface ResolvedVariantSpec {
    spec: VariantSpec;
    selection: Record<string, string>;
    options: AttributeOption[];
    key: string;
}

/** Identity of a variant: its sorted option ids. Name, SKU and prices never take part. */
export function identityKey(selection: Record<string, string>): string {
    return Object.values(selection).sort().join(',');
}

@Injectable()
export class VariantReconcilerService {
    private readonly logger = new Logger(VariantReconcilerService.name);

    constructor(private readonly attributeCatalog: AttributeCatalogService) {}

    reconcile(ws: ProductWorkspace, specs: VariantSpec[]): VariantReconcileResult {
        const resolved = specs.map((spec) => this.resolve(ws, spec));
        this.assertDistinct(resolved);

        const existingByKey = new Map<string, Variant>();
        for (const variant of ws.activeVariants()) {
            existingByKey.set(identityKey(variant.Selection), variant);
        }
        const wantedKeys = new Set(resolved.map((entry) => entry.key));

        // Retirements first, so a SKU freed by a retired variant can be reused in the same save.
        let retired = 0;
        for (const [key, variant] of existingByKey) {
            if (wantedKeys.has(key)) continue;
            ws.retireVariant(variant.Id);
            retired++;
        }

        const skus = new Set(resolved.flatMap((entry) => (entry.spec.sku ? [entry.spec.sku] : [])));
        for (const entry of resolved) {
            const existing = existingByKey.get(entry.key);
            if (!existing || entry.spec.sku) continue;
            if (skus.has(existing.Sku)) {
                throw new ReconciliationConflict(`SKU "${existing.Sku}" is claimed by another row.`, [
                    { facet: 'variants', row: entry.spec.row, field: 'sku', message: `Variant ${existing.Sku} keeps its SKU, which another row also uses.` },
                ]);
            }
            skus.add(existing.Sku);
        }

        let created = 0;
        let updated = 0;
        for (const entry of resolved) {
            const existing = existingByKey.get(entry.key);
            if (existing) {
                if (this.update(ws, existing, entry)) updated++;
                continue;
            }
            const sku = entry.spec.sku ?? this.generateSku(ws, entry.options, skus);
            skus.add(sku);
            this.create(ws, entry, sku);
            created++;
        }

        this.logger.log(
            `Variants of product ${ws.productId}: ${created} created, ${updated} updated, ${retired} retired`,
        );
        return { created, updated, retired };
    }

    private resolve(ws: ProductWorkspace, spec: VariantSpec): ResolvedVariantSpec {
        const selection: Record<string, string> = {};
        const options: AttributeOption[] = [];
        for (const { key, value } of spec.attributes) {
            const { type, option } = this.attributeCatalog.resolveOption(ws, key, value, spec.row);
            const previous = selection[type.Id];
            if (previous !== undefined && previous !== option.Id) {
                throw new ReconciliationConflict(`Variant row ${spec.row} sets "${type.Name}" twice.`, [
                    { facet: 'variants', row: spec.row, field: key, message: `"${type.Name}" already has a value in this row.` },
                ]);
            }
            if (previous === undefined) {
                selection[type.Id] = option.Id;
                options.push(option);
            }
        }
        return { spec, selection, options, key: identityKey(selection) };
    }

    private assertDistinct(resolved: ResolvedVariantSpec[]): void {
        const issues: RowIssue[] = [];
        const keys = new Map<string, number>();
        const skus = new Map<string, number>();
        for (const { spec, key } of resolved) {
            const firstRow = keys.get(key);
            if (firstRow !== undefined) {
                issues.push({ facet: 'variants', row: spec.row, message: `Same attribute values as row ${firstRow}.` });
            } else {
                keys.set(key, spec.row);
            }
            if (spec.sku) {
                const skuRow = skus.get(spec.sku);
                if (skuRow !== undefined) {
                    issues.push({ facet: 'variants', row: spec.row, field: 'sku', message: `SKU "${spec.sku}" is also used by row ${skuRow}.` });
                } else {
                    skus.set(spec.sku, spec.row);
                }
            }
        }
        if (issues.length > 0) {
            throw new ReconciliationConflict(`${issues.length} variant row(s) collide with another row.`, issues);
        }
    }

    private update(ws: ProductWorkspace, existing: Variant, entry: ResolvedVariantSpec): boolean {
        const { spec } = entry;
        const candidate: Variant = {
            ...existing,
            Name: spec.name ?? existing.Name,
            Sku: spec.sku ?? existing.Sku,
            PurchasePrice: spec.purchasePrice !== undefined ? spec.purchasePrice : existing.PurchasePrice,
            SalePrice: spec.salePrice ?? existing.SalePrice,
            StockQty: spec.stockQty ?? existing.StockQty,
            Images: spec.images ?? existing.Images,
            Selection: entry.selection,
        };
        if (canonicalJson(candidate) === canonicalJson(existing)) return false;

        this.trackPrice(ws, existing, 'purchase', existing.PurchasePrice, candidate.PurchasePrice);
        this.trackPrice(ws, existing, 'sale', existing.SalePrice, candidate.SalePrice);
        ws.putVariant({ ...candidate, UpdatedAt: ws.now });
        return true;
    }

    private create(ws: ProductWorkspace, entry: ResolvedVariantSpec, sku: string): void {
        const { spec } = entry;
        ws.putVariant({
            Id: ws.newId(),
            ProductId: ws.productId,
            Sku: sku,
            Name: spec.name ?? entry.options.map((option) => option.DisplayName).join(' / '),
            PurchasePrice: spec.purchasePrice ?? null,
            SalePrice: spec.salePrice ?? 0,
            StockQty: spec.stockQty ?? 0,
            Images: spec.images ?? [],
            Selection: entry.selection,
            IsActive: true,
            RetiredAt: null,
            CreatedAt: ws.now,
            UpdatedAt: ws.now,
        });
    }

    private trackPrice(
        ws: ProductWorkspace,
        variant: Variant,
        field: PriceTransition['field'],
        oldPrice: number | null,
        newPrice: number | null,
    ): void {
        if (oldPrice === newPrice) return;
        ws.priceTransitions.push({ variantId: variant.Id, sku: variant.Sku, field, oldPrice, newPrice });
    }

    /** "<product-slug>-<value>-<value>" upper-cased, suffixed when taken. */
    private generateSku(ws: ProductWorkspace, options: AttributeOption[], taken: Set<string>): string {
        const parts = [ws.product.Slug, ...options.map((option) => slugify(option.Value))].filter((part) => part.length > 0);
        const base = (parts.length > 0 ? parts.join('-') : 'variant').toUpperCase();
        return uniqueSlug(base, taken);
    }
}
