import { Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../../common/errors/catalog.errors';
import { normalizeValue, slugify } from '../../common/utils/slugify';
import { AttributeOption, AttributeScope, AttributeType } from '../entities/attribute.entity';
import { AttributeSpec } from '../types/facet-specs.types';
import { ProductWorkspace } from '../workspace/product-workspace';

/** attribute name as written -> normalized value -> option */
export type AttributeMapping = Map<string, Map<string, AttributeOption>>;

export interface ResolvedOption {
    type: AttributeType;
    option: AttributeOption;
}

const byDisplayOrder = <T extends { DisplayOrder: number; Id: string }>(a: T, b: T): number =>
    a.DisplayOrder - b.DisplayOrder || (a.Id < b.Id ? -1 : a.Id > b.Id ? 1 : 0);

@Injectable()
export class AttributeCatalogService {
    private readonly logger = new Logger(AttributeCatalogService.name);

    /**
     * Resolves every listed attribute and value to catalog rows, creating what is missing.
     * Values reuse a global option when its value or filter group matches; otherwise the
     * product gets its own option. A product-scoped attribute never binds to a global type.
     */
    reconcile(ws: ProductWorkspace, specs: AttributeSpec[]): AttributeMapping {
        const mapping: AttributeMapping = new Map();
        for (const spec of specs) {
            const type = this.resolveType(ws, spec.name, spec.scope ?? 'global', spec.row);
            const values = mapping.get(spec.name) ?? new Map<string, AttributeOption>();
            for (const value of spec.values) {
                values.set(normalizeValue(value), this.resolveOptionOfType(ws, type, value));
            }
            mapping.set(spec.name, values);
        }
        return mapping;
    }

    /**
     * Deletes the product's own options that the attributes facet no longer lists.
     * Options still selected by an active variant survive with a warning.
     */
    pruneUnlisted(ws: ProductWorkspace, mapping: AttributeMapping): number {
        const listed = new Set<string>();
        mapping.forEach((values) => values.forEach((option) => listed.add(option.Id)));

        const inUse = new Map<string, string[]>();
        for (const variant of ws.activeVariants()) {
            for (const optionId of Object.values(variant.Selection)) {
                inUse.set(optionId, [...(inUse.get(optionId) ?? []), variant.Sku]);
            }
        }

        let removed = 0;
        for (const option of [...ws.options.values()].sort(byDisplayOrder)) {
            if (option.ProductId !== ws.productId || listed.has(option.Id)) continue;
            const skus = inUse.get(option.Id);
            if (skus) {
                const typeName = ws.types.get(option.AttributeTypeId)?.Name ?? option.AttributeTypeId;
                ws.warnings.push(
                    `Option "${typeName}: ${option.Value}" was kept because variants still use it: ${skus.join(', ')}.`,
                );
                continue;
            }
            ws.deleteOption(option.Id);
            removed++;
        }
        if (removed > 0) this.logger.log(`Removed ${removed} unused option(s) from product ${ws.productId}`);
        return removed;
    }

    /** Used by the variant reconciler: unknown attributes and values are created on the fly. */
    resolveOption(ws: ProductWorkspace, key: string, value: string, row?: number): ResolvedOption {
        const type = this.resolveType(ws, key, 'global', row);
        return { type, option: this.resolveOptionOfType(ws, type, value) };
    }

    /** Lookup without creation: product-scoped type of this product first, then global. */
    findType(ws: ProductWorkspace, key: string): AttributeType | undefined {
        const slug = slugify(key);
        const candidates = [...ws.types.values()].filter((type) => type.Slug === slug);
        return (
            candidates.find((type) => type.Scope === 'product' && type.ProductId === ws.productId) ??
            candidates.find((type) => type.Scope === 'global')
        );
    }

    /** Lookup without creation: product option by value, then global option by value, then by filter group. */
    findOption(ws: ProductWorkspace, type: AttributeType, value: string): AttributeOption | undefined {
        const normalized = normalizeValue(value);
        const options = [...ws.options.values()].filter((option) => option.AttributeTypeId === type.Id);
        return (
            options.find((option) => option.ProductId === ws.productId && normalizeValue(option.Value) === normalized) ??
            options.find((option) => option.ProductId === null && normalizeValue(option.Value) === normalized) ??
            options.find((option) => option.ProductId === null && option.FilterGroup === normalized)
        );
    }

    optionsOf(ws: ProductWorkspace, typeId: string): AttributeOption[] {
        return [...ws.options.values()].filter((option) => option.AttributeTypeId === typeId).sort(byDisplayOrder);
    }

    private resolveType(ws: ProductWorkspace, name: string, scope: AttributeScope, row?: number): AttributeType {
        const existing =
            scope === 'product'
                ? [...ws.types.values()].find(
                      (type) => type.Scope === 'product' && type.ProductId === ws.productId && type.Slug === slugify(name),
                  )
                : this.findType(ws, name);
        if (existing) return existing;

        const slug = slugify(name);
        if (!slug) {
            throw new ValidationError(`Attribute name "${name}" has no usable characters.`, [
                { facet: 'attributes', row, field: 'attribute', message: `"${name}" cannot be turned into a slug.` },
            ]);
        }
        const type: AttributeType = {
            Id: ws.newId(),
            Name: name.trim(),
            Slug: slug,
            Scope: scope,
            ProductId: scope === 'product' ? ws.productId : null,
            DisplayOrder: ws.types.size,
        };
        ws.addType(type);
        this.logger.debug(`Created ${scope} attribute type "${type.Name}" (${type.Slug})`);
        return type;
    }

    private resolveOptionOfType(ws: ProductWorkspace, type: AttributeType, value: string): AttributeOption {
        const existing = this.findOption(ws, type, value);
        if (existing) return existing;

        const option: AttributeOption = {
            Id: ws.newId(),
            AttributeTypeId: type.Id,
            ProductId: ws.productId,
            Value: value.trim(),
            DisplayName: value.trim(),
            FilterGroup: normalizeValue(value),
            DisplayOrder: this.optionsOf(ws, type.Id).length,
        };
        ws.addOption(option);
        return option;
    }
}
