import { ProductStats } from '../product-stats';
import { CompatibilityPair } from '../navigation/dependency-inference.service';

export interface Product {
    Id: string; // uuid PRIMARY KEY
    Name: string; // text NOT NULL
    Slug: string; // text NOT NULL UNIQUE
    Description: string; // text NOT NULL DEFAULT ''
    IsActive: boolean; // boolean NOT NULL DEFAULT true
    // Scalar commercial fields, authoritative only while the product has no active variants
    PurchasePrice: number | null; // numeric(10,2)
    SalePrice: number | null; // numeric(10,2)
    StockQty: number; // integer NOT NULL DEFAULT 0
    Images: string[]; // jsonb NOT NULL DEFAULT '[]'
    // Edit facets as last reconciled
    AttributesJson: unknown[] | null; // jsonb
    VariantsJson: unknown[] | null; // jsonb
    GroupsJson: unknown[] | null; // jsonb
    CategoriesJson: unknown[] | null; // jsonb
    AttributesHash: string | null; // text
    VariantsHash: string | null; // text
    GroupsHash: string | null; // text
    CategoriesHash: string | null; // text
    CompatibilityJson: CompatibilityPair[]; // jsonb NOT NULL DEFAULT '[]'
    Stats: ProductStats | null; // jsonb
    Version: number; // integer NOT NULL DEFAULT 0
    CreatedAt: string; // timestamptz NOT NULL DEFAULT now()
    UpdatedAt: string; // timestamptz NOT NULL DEFAULT now()
}
