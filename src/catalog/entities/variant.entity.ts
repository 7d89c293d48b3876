export interface Variant {
    Id: string; // uuid PRIMARY KEY
    ProductId: string; // uuid NOT NULL REFERENCES Products(Id)
    Sku: string; // text NOT NULL
    Name: string; // text NOT NULL DEFAULT ''
    PurchasePrice: number | null; // numeric(10,2)
    SalePrice: number; // numeric(10,2) NOT NULL DEFAULT 0
    StockQty: number; // integer NOT NULL DEFAULT 0
    Images: string[]; // jsonb NOT NULL DEFAULT '[]'
    Selection: Record<string, string>; // jsonb: AttributeTypeId -> AttributeOptionId
    IsActive: boolean; // boolean NOT NULL DEFAULT true
    RetiredAt: string | null; // timestamptz
    CreatedAt: string; // timestamptz NOT NULL DEFAULT now()
    UpdatedAt: string; // timestamptz NOT NULL DEFAULT now()
}
