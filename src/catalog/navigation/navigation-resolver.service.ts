import { Injectable, Logger } from '@nestjs/common';
import { ReferentialIntegrityError, ValidationError } from '../../common/errors/catalog.errors';
import { normalizeValue, slugify } from '../../common/utils/slugify';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';
import { CompatibilityRelation } from './dependency-inference.service';

export type NavigationContext = { groupId: string } | { variantId: string };

export interface NavigationQuery {
    context: NavigationContext;
    /** attribute slug (or name) -> value; null unpins the attribute */
    overrides: Record<string, string | null>;
}

export interface NavigationState {
    types: AttributeType[];
    options: AttributeOption[];
    variants: Variant[]; // active
    groups: VariantGroup[]; // active
    relation: CompatibilityRelation;
}

export type ResolvedTarget =
    | { type: 'group'; id: string; slug: string; name: string; matchScore: number }
    | { type: 'variant'; id: string; sku: string; name: string; matchScore: number };

export interface AvailableOption {
    value: string;
    displayName: string;
    reachable: boolean;
    selected: boolean;
}

export interface NavigationResult {
    resolvedTarget: ResolvedTarget | null;
    target: Record<string, string>; // attribute slug -> option value
    availableOptions: Record<string, AvailableOption[]>;
}

/** typeId -> optionId */
type Assignment = Map<string, string>;

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Options of the same type shared by every member; attributes where members disagree stay unset. */
export function sharedAssignment(members: Variant[]): Assignment {
    const shared: Assignment = new Map();
    if (members.length === 0) return shared;
    for (const [typeId, optionId] of Object.entries(members[0].Selection)) {
        if (members.every((variant) => variant.Selection[typeId] === optionId)) shared.set(typeId, optionId);
    }
    return shared;
}

/**
 * Best-match navigation over one product's groups and variants. Pure: everything it
 * needs is passed in, nothing is read or written.
 */
@Injectable()
export class NavigationResolverService {
    private readonly logger = new Logger(NavigationResolverService.name);

    resolve(state: NavigationState, query: NavigationQuery): NavigationResult {
        const variantsById = new Map(state.variants.map((variant) => [variant.Id, variant] as const));
        const usedTypes = this.usedTypes(state);
        const usedOptions = this.usedOptions(state);

        const context = this.contextAssignment(state, variantsById, query.context);
        const pins = this.pins(query.overrides, usedTypes, usedOptions);
        const target = this.applyOverrides(state.relation, context, pins, usedOptions);
        const activePins = this.activePins(pins);

        const resolvedTarget =
            this.bestGroup(state, variantsById, pins, target) ?? this.bestVariant(state.variants, pins, target);
        this.logger.debug(
            `Navigation resolved to ${resolvedTarget ? `${resolvedTarget.type} ${resolvedTarget.id} (score ${resolvedTarget.matchScore})` : 'nothing'}`,
        );

        const optionsById = new Map(state.options.map((option) => [option.Id, option] as const));
        const targetOut: Record<string, string> = {};
        const availableOptions: Record<string, AvailableOption[]> = {};
        for (const type of usedTypes) {
            const selected = target.get(type.Id);
            const selectedOption = selected ? optionsById.get(selected) : undefined;
            if (selectedOption) targetOut[type.Slug] = selectedOption.Value;
            availableOptions[type.Slug] = (usedOptions.get(type.Id) ?? []).map((option) => ({
                value: option.Value,
                displayName: option.DisplayName,
                reachable: this.reachable(state.variants, activePins, type.Id, option.Id),
                selected: option.Id === selected,
            }));
        }

        return { resolvedTarget, target: targetOut, availableOptions };
    }

    private contextAssignment(
        state: NavigationState,
        variantsById: Map<string, Variant>,
        context: NavigationContext,
    ): Assignment {
        if ('variantId' in context) {
            const variant = variantsById.get(context.variantId);
            if (!variant) throw new ReferentialIntegrityError(`Variant ${context.variantId} is not an active variant of this product.`);
            return new Map(Object.entries(variant.Selection));
        }
        const group = state.groups.find((candidate) => candidate.Id === context.groupId);
        if (!group) throw new ReferentialIntegrityError(`Group ${context.groupId} is not an active group of this product.`);
        return sharedAssignment(this.members(group, variantsById));
    }

    private pins(
        overrides: Record<string, string | null>,
        usedTypes: AttributeType[],
        usedOptions: Map<string, AttributeOption[]>,
    ): Map<string, string | null> {
        const pins = new Map<string, string | null>();
        for (const [key, value] of Object.entries(overrides)) {
            const slug = slugify(key);
            const type = usedTypes.find((candidate) => candidate.Slug === slug || candidate.Id === key);
            if (!type) throw new ValidationError(`Unknown attribute "${key}" in overrides.`, [{ field: key, message: 'Not an attribute of this product.' }]);
            if (value === null) {
                pins.set(type.Id, null);
                continue;
            }
            const normalized = normalizeValue(value);
            const option = (usedOptions.get(type.Id) ?? []).find(
                (candidate) => normalizeValue(candidate.Value) === normalized || candidate.FilterGroup === normalized,
            );
            if (!option) throw new ValidationError(`"${value}" is not a value of "${type.Name}" for this product.`, [{ field: key, message: `Unknown value "${value}".` }]);
            pins.set(type.Id, option.Id);
        }
        return pins;
    }

    /**
     * target = context with the user's pins applied. A context value that cannot co-occur
     * with every pin is replaced by the only option that can, or dropped when there is
     * no single such option.
     */
    private applyOverrides(
        relation: CompatibilityRelation,
        context: Assignment,
        rawPins: Map<string, string | null>,
        usedOptions: Map<string, AttributeOption[]>,
    ): Assignment {
        const pins = this.activePins(rawPins);
        const target: Assignment = new Map();
        for (const [typeId, optionId] of context) {
            if (rawPins.has(typeId)) continue;
            const fits = (candidate: string): boolean =>
                [...pins].every(([pinType, pinOption]) => relation.compatible(typeId, candidate, pinType, pinOption));
            if (fits(optionId)) {
                target.set(typeId, optionId);
                continue;
            }
            const alternatives = (usedOptions.get(typeId) ?? []).filter((option) => fits(option.Id));
            if (alternatives.length === 1) target.set(typeId, alternatives[0].Id);
        }
        pins.forEach((optionId, typeId) => target.set(typeId, optionId));
        return target;
    }

    private bestGroup(
        state: NavigationState,
        variantsById: Map<string, Variant>,
        rawPins: Map<string, string | null>,
        target: Assignment,
    ): ResolvedTarget | null {
        const pins = this.activePins(rawPins);
        const candidates = state.groups
            .map((group) => ({ group, shared: sharedAssignment(this.members(group, variantsById)) }))
            .filter(({ shared }) => [...pins].every(([typeId, optionId]) => shared.get(typeId) === optionId))
            .map(({ group, shared }) => ({ group, score: this.satisfied(target, (typeId) => shared.get(typeId)) }))
            .sort((a, b) => b.score - a.score || compareIds(a.group.Id, b.group.Id));
        const best = candidates[0];
        if (!best) return null;
        return { type: 'group', id: best.group.Id, slug: best.group.Slug, name: best.group.Name, matchScore: best.score };
    }

    private bestVariant(variants: Variant[], rawPins: Map<string, string | null>, target: Assignment): ResolvedTarget | null {
        const pins = this.activePins(rawPins);
        const ranked = variants
            .map((variant) => ({
                variant,
                allPins: [...pins].every(([typeId, optionId]) => variant.Selection[typeId] === optionId) ? 1 : 0,
                score: this.satisfied(target, (typeId) => variant.Selection[typeId]),
            }))
            .sort((a, b) => b.allPins - a.allPins || b.score - a.score || compareIds(a.variant.Id, b.variant.Id));
        const best = ranked[0];
        if (!best) return null;
        return { type: 'variant', id: best.variant.Id, sku: best.variant.Sku, name: best.variant.Name, matchScore: best.score };
    }

    /** Some active variant holds the option together with every pin on another attribute. */
    private reachable(variants: Variant[], pins: Map<string, string>, typeId: string, optionId: string): boolean {
        return variants.some(
            (variant) =>
                variant.Selection[typeId] === optionId &&
                [...pins].every(([pinType, pinOption]) => pinType === typeId || variant.Selection[pinType] === pinOption),
        );
    }

    private satisfied(target: Assignment, valueOf: (typeId: string) => string | undefined): number {
        let count = 0;
        target.forEach((optionId, typeId) => {
            if (valueOf(typeId) === optionId) count++;
        });
        return count;
    }

    private activePins(pins: Map<string, string | null>): Map<string, string> {
        const active = new Map<string, string>();
        pins.forEach((optionId, typeId) => {
            if (optionId !== null) active.set(typeId, optionId);
        });
        return active;
    }

    private members(group: VariantGroup, variantsById: Map<string, Variant>): Variant[] {
        return group.MemberVariantIds.flatMap((id) => {
            const variant = variantsById.get(id);
            return variant ? [variant] : [];
        });
    }

    private usedTypes(state: NavigationState): AttributeType[] {
        const typeIds = new Set(state.variants.flatMap((variant) => Object.keys(variant.Selection)));
        return state.types
            .filter((type) => typeIds.has(type.Id))
            .sort((a, b) => a.DisplayOrder - b.DisplayOrder || a.Slug.localeCompare(b.Slug));
    }

    private usedOptions(state: NavigationState): Map<string, AttributeOption[]> {
        const optionIds = new Set(state.variants.flatMap((variant) => Object.values(variant.Selection)));
        const byType = new Map<string, AttributeOption[]>();
        state.options
            .filter((option) => optionIds.has(option.Id))
            .sort((a, b) => a.DisplayOrder - b.DisplayOrder || compareIds(a.Id, b.Id))
            .forEach((option) => byType.set(option.AttributeTypeId, [...(byType.get(option.AttributeTypeId) ?? []), option]));
        return byType;
    }
}
