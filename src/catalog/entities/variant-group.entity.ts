import { MemberFilter } from '../types/facet-specs.types';

export interface VariantGroup {
    Id: string; // uuid PRIMARY KEY
    ProductId: string; // uuid NOT NULL REFERENCES Products(Id)
    Name: string; // text NOT NULL
    Slug: string; // text NOT NULL, UNIQUE (ProductId, Slug) WHERE IsActive
    Description: string; // text NOT NULL DEFAULT ''
    Images: string[]; // jsonb NOT NULL DEFAULT '[]', as supplied by the operator
    DisplayImage: string | null; // text, Images[0] or the first member image
    MemberVariantIds: string[]; // jsonb NOT NULL, never empty while active
    MemberFilter: MemberFilter | null; // jsonb, kept when membership came from a filter
    IsActive: boolean; // boolean NOT NULL DEFAULT true
    RetiredAt: string | null; // timestamptz
    CreatedAt: string; // timestamptz NOT NULL DEFAULT now()
    UpdatedAt: string; // timestamptz NOT NULL DEFAULT now()
}
