import { Injectable, Logger } from '@nestjs/common';
import { ReferentialIntegrityError, RowIssue } from '../../common/errors/catalog.errors';
import { slugify, uniqueSlug } from '../../common/utils/slugify';
import { canonicalJson } from '../../common/utils/stable-hash';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';
import { GroupSpec, MemberFilter, VariantKey } from '../types/facet-specs.types';
import { ProductWorkspace } from '../workspace/product-workspace';
import { AttributeCatalogService } from './attribute-catalog.service';

export interface GroupReconcileResult {
    created: number;
    updated: number;
    retired: number;
}

/**
 * strict: every explicit member must resolve, as when the operator edits the groups facet.
 * dependency: the stored groups are replayed after a variant edit; members that vanished
 * are dropped and groups left empty are retired, each with a warning.
 */
export type GroupReconcileMode = 'strict' | 'dependency';

@Injectable()
export class GroupReconcilerService {
    private readonly logger = new Logger(GroupReconcilerService.name);

    constructor(private readonly attributeCatalog: AttributeCatalogService) {}

    reconcile(ws: ProductWorkspace, specs: GroupSpec[], mode: GroupReconcileMode = 'strict'): GroupReconcileResult {
        const variants = ws.activeVariants();
        const issues: RowIssue[] = [];
        const planned: Array<{ spec: GroupSpec; slug: string; members: Variant[] }> = [];
        const taken = new Set<string>();

        for (const spec of specs) {
            const slug = uniqueSlug(spec.slug || slugify(spec.name) || 'group', taken);
            taken.add(slug);
            const members =
                spec.members.kind === 'filter'
                    ? this.applyFilter(ws, variants, spec.members.filter)
                    : this.resolveKeys(ws, variants, spec, mode, issues);
            if (members.length === 0) {
                if (mode === 'dependency') {
                    ws.warnings.push(`Group "${spec.name}" no longer has any member and was retired.`);
                    taken.delete(slug);
                    continue;
                }
                issues.push({ facet: 'groups', row: spec.row, field: 'members', message: `Group "${spec.name}" resolves to no variant.` });
                continue;
            }
            planned.push({ spec, slug, members });
        }

        if (issues.length > 0) {
            throw new ReferentialIntegrityError(`${issues.length} group member reference(s) could not be resolved.`, issues);
        }

        const existingBySlug = new Map(ws.activeGroups().map((group) => [group.Slug, group] as const));
        let retired = 0;
        for (const [slug, group] of existingBySlug) {
            if (taken.has(slug)) continue;
            ws.retireGroup(group.Id);
            retired++;
        }

        let created = 0;
        let updated = 0;
        for (const { spec, slug, members } of planned) {
            const existing = existingBySlug.get(slug);
            const images = spec.images ?? [];
            const memberIds = members.map((variant) => variant.Id).sort();
            const fields = {
                Name: spec.name,
                Slug: slug,
                Description: spec.description ?? '',
                Images: images,
                DisplayImage: images[0] ?? this.firstMemberImage(members),
                MemberVariantIds: memberIds,
                MemberFilter: spec.members.kind === 'filter' ? spec.members.filter : null,
            };
            if (existing) {
                const candidate: VariantGroup = { ...existing, ...fields };
                if (canonicalJson(candidate) !== canonicalJson(existing)) {
                    ws.putGroup({ ...candidate, UpdatedAt: ws.now });
                    updated++;
                }
                continue;
            }
            ws.putGroup({
                Id: ws.newId(),
                ProductId: ws.productId,
                ...fields,
                IsActive: true,
                RetiredAt: null,
                CreatedAt: ws.now,
                UpdatedAt: ws.now,
            });
            created++;
        }

        this.logger.log(`Groups of product ${ws.productId}: ${created} created, ${updated} updated, ${retired} retired`);
        return { created, updated, retired };
    }

    /**
     * Variants whose option for every `match` attribute is one of the listed values and
     * whose option for every `exclude` attribute is not. Unknown values match nothing.
     */
    applyFilter(ws: ProductWorkspace, variants: Variant[], filter: MemberFilter): Variant[] {
        const match = this.criteria(ws, filter.match);
        const exclude = this.criteria(ws, filter.exclude);
        return variants.filter(
            (variant) =>
                [...match].every(([typeId, optionIds]) => optionIds.has(variant.Selection[typeId])) &&
                [...exclude].every(([typeId, optionIds]) => !optionIds.has(variant.Selection[typeId])),
        );
    }

    private criteria(ws: ProductWorkspace, clauses: Record<string, string[]>): Map<string, Set<string>> {
        const resolved = new Map<string, Set<string>>();
        for (const [key, values] of Object.entries(clauses)) {
            const type = this.attributeCatalog.findType(ws, key);
            if (!type) {
                throw new ReferentialIntegrityError(`Group filter names unknown attribute "${key}".`, [
                    { facet: 'groups', field: key, message: `Attribute "${key}" does not exist.` },
                ]);
            }
            const optionIds = resolved.get(type.Id) ?? new Set<string>();
            for (const value of values) {
                const option = this.attributeCatalog.findOption(ws, type, value);
                if (option) optionIds.add(option.Id);
            }
            resolved.set(type.Id, optionIds);
        }
        return resolved;
    }

    private resolveKeys(
        ws: ProductWorkspace,
        variants: Variant[],
        spec: GroupSpec,
        mode: GroupReconcileMode,
        issues: RowIssue[],
    ): Variant[] {
        if (spec.members.kind !== 'explicit') return [];
        const members = new Map<string, Variant>();
        for (const key of spec.members.keys) {
            const variant = this.resolveKey(ws, variants, key);
            if (variant) {
                members.set(variant.Id, variant);
                continue;
            }
            const label = key.kind === 'sku' ? key.sku : JSON.stringify(key.values);
            if (mode === 'dependency') {
                ws.warnings.push(`Group "${spec.name}" lost member ${label}, which is no longer an active variant.`);
            } else {
                issues.push({ facet: 'groups', row: spec.row, field: 'members', message: `Member ${label} is not a variant of this product.` });
            }
        }
        return [...members.values()];
    }

    /** A selection key must name exactly one active variant; partial selections that fit several do not resolve. */
    private resolveKey(ws: ProductWorkspace, variants: Variant[], key: VariantKey): Variant | undefined {
        if (key.kind === 'sku') {
            return variants.find((variant) => variant.Sku === key.sku);
        }
        const wanted: Array<[string, string]> = [];
        for (const [attribute, value] of Object.entries(key.values)) {
            const type = this.attributeCatalog.findType(ws, attribute);
            const option = type ? this.attributeCatalog.findOption(ws, type, value) : undefined;
            if (!type || !option) return undefined;
            wanted.push([type.Id, option.Id]);
        }
        const found = variants.filter((variant) => wanted.every(([typeId, optionId]) => variant.Selection[typeId] === optionId));
        return found.length === 1 ? found[0] : undefined;
    }

    private firstMemberImage(members: Variant[]): string | null {
        const ordered = [...members].sort((a, b) => (a.Id < b.Id ? -1 : a.Id > b.Id ? 1 : 0));
        for (const variant of ordered) {
            if (variant.Images.length > 0) return variant.Images[0];
        }
        return null;
    }
}
