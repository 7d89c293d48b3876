import { HttpException, HttpStatus } from '@nestjs/common';

export type FacetName = 'attributes' | 'variants' | 'groups' | 'categories';

export interface RowIssue {
    facet?: FacetName;
    row?: number; // zero-based index inside the facet array
    field?: string;
    message: string;
}

export type CatalogErrorCode =
    | 'VALIDATION_ERROR'
    | 'RECONCILIATION_CONFLICT'
    | 'CONCURRENCY_CONFLICT'
    | 'REFERENTIAL_INTEGRITY_ERROR'
    | 'CATEGORY_CYCLE_ERROR';

/**
 * Base for every domain error raised by the catalog core.
 * The HTTP body carries the code and the row-level issues so the bulk editor can
 * highlight the offending cells.
 */
export abstract class CatalogError extends HttpException {
    abstract readonly code: CatalogErrorCode;

    constructor(message: string, status: HttpStatus, readonly issues: RowIssue[] = []) {
        super({ message, issues }, status);
    }
}

export class ValidationError extends CatalogError {
    readonly code = 'VALIDATION_ERROR' as const;

    constructor(message: string, issues: RowIssue[] = []) {
        super(message, HttpStatus.BAD_REQUEST, issues);
    }
}

export class ReconciliationConflict extends CatalogError {
    readonly code = 'RECONCILIATION_CONFLICT' as const;

    constructor(message: string, issues: RowIssue[] = []) {
        super(message, HttpStatus.CONFLICT, issues);
    }
}

export class ConcurrencyConflict extends CatalogError {
    readonly code = 'CONCURRENCY_CONFLICT' as const;

    constructor(
        readonly productId: string,
        readonly expectedVersion: number,
        readonly actualVersion: number | null,
    ) {
        super(
            `Product ${productId} was modified by someone else (expected version ${expectedVersion}, found ${actualVersion ?? 'none'}).`,
            HttpStatus.CONFLICT,
        );
    }
}

export class ReferentialIntegrityError extends CatalogError {
    readonly code = 'REFERENTIAL_INTEGRITY_ERROR' as const;

    constructor(message: string, issues: RowIssue[] = []) {
        super(message, HttpStatus.UNPROCESSABLE_ENTITY, issues);
    }
}

export class CategoryCycleError extends CatalogError {
    readonly code = 'CATEGORY_CYCLE_ERROR' as const;

    constructor(message: string, issues: RowIssue[] = []) {
        super(message, HttpStatus.UNPROCESSABLE_ENTITY, issues);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
