export type AttributeScope = 'global' | 'product';

export interface AttributeType {
    Id: string; // uuid PRIMARY KEY
    Name: string; // text NOT NULL
    Slug: string; // text NOT NULL, UNIQUE (Slug, Scope, coalesce(ProductId))
    Scope: AttributeScope; // text NOT NULL
    ProductId: string | null; // uuid REFERENCES Products(Id), set iff Scope = 'product'
    DisplayOrder: number; // integer NOT NULL DEFAULT 0
}

export interface AttributeOption {
    Id: string; // uuid PRIMARY KEY
    AttributeTypeId: string; // uuid NOT NULL REFERENCES AttributeTypes(Id)
    ProductId: string | null; // uuid REFERENCES Products(Id), NULL means global
    Value: string; // text NOT NULL, UNIQUE (AttributeTypeId, coalesce(ProductId), lower(Value))
    DisplayName: string; // text NOT NULL
    FilterGroup: string; // text NOT NULL
    DisplayOrder: number; // integer NOT NULL DEFAULT 0
}
