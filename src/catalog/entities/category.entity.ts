export interface Category {
    Id: string; // uuid PRIMARY KEY
    Name: string; // text NOT NULL
    Slug: string; // text NOT NULL, UNIQUE (Slug, coalesce(ParentId))
    ParentId: string | null; // uuid REFERENCES Categories(Id)
    Path: string; // text NOT NULL, "Pintura > Tinta > Tinta para Tecido"
    PathIds: string[]; // jsonb NOT NULL, root first, self last
    IsActive: boolean; // boolean NOT NULL DEFAULT true
    CreatedAt: string; // timestamptz NOT NULL DEFAULT now()
    UpdatedAt: string; // timestamptz NOT NULL DEFAULT now()
}

export interface ProductCategory {
    Id: string; // text PRIMARY KEY, "<ProductId>:<CategoryId>"
    ProductId: string; // uuid NOT NULL REFERENCES Products(Id)
    CategoryId: string; // uuid NOT NULL REFERENCES Categories(Id)
    IsExplicit: boolean; // named in the categories facet, false when implied by a descendant
}

export function productCategoryId(productId: string, categoryId: string): string {
    return `${productId}:${categoryId}`;
}
