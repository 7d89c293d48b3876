import { Type } from 'class-transformer';
import {
    ArrayMaxSize,
    IsArray,
    IsBoolean,
    IsInt,
    IsNotEmpty,
    IsNumber,
    IsOptional,
    IsString,
    Length,
    Min,
    ValidateNested,
} from 'class-validator';

// Facet payloads stay untyped here; FacetParser validates their shape row by row.
class ProductFacetsDto {
    @IsOptional()
    attributes_json?: unknown;

    @IsOptional()
    variants_json?: unknown;

    @IsOptional()
    groups_json?: unknown;

    @IsOptional()
    categories_json?: unknown;
}

class ProductFieldsDto extends ProductFacetsDto {
    @IsString({ message: 'Slug must be a string.' })
    @IsOptional()
    @Length(1, 200, { message: 'Slug must be between 1 and 200 characters.' })
    slug?: string;

    @IsString({ message: 'Description must be a string.' })
    @IsOptional()
    description?: string;

    @IsBoolean({ message: 'is_active must be a boolean.' })
    @IsOptional()
    is_active?: boolean;

    @IsNumber({}, { message: 'purchase_price must be a number.' })
    @Min(0, { message: 'purchase_price cannot be negative.' })
    @IsOptional()
    purchase_price?: number | null;

    @IsNumber({}, { message: 'sale_price must be a number.' })
    @Min(0, { message: 'sale_price cannot be negative.' })
    @IsOptional()
    sale_price?: number | null;

    @IsInt({ message: 'stock_qty must be an integer.' })
    @IsOptional()
    stock_qty?: number;

    @IsArray({ message: 'images must be an array of strings.' })
    @IsString({ each: true, message: 'Each image must be a string.' })
    @IsOptional()
    images?: string[];
}

export class CreateProductRowDto extends ProductFieldsDto {
    @IsString({ message: 'Product name must be a string.' })
    @IsNotEmpty({ message: 'Product name is required and cannot be empty.' })
    @Length(1, 255, { message: 'Product name must be between 1 and 255 characters.' })
    name!: string;
}

export class UpdateProductRowDto extends ProductFieldsDto {
    @IsString({ message: 'Product id must be a string.' })
    @IsNotEmpty({ message: 'Product id is required.' })
    id!: string;

    @IsInt({ message: 'version must be an integer.' })
    @Min(0, { message: 'version cannot be negative.' })
    version!: number;

    @IsString({ message: 'Product name must be a string.' })
    @IsOptional()
    @Length(1, 255, { message: 'Product name must be between 1 and 255 characters.' })
    name?: string;
}

export class BulkSaveDto {
    @IsArray()
    @IsOptional()
    @ArrayMaxSize(5000)
    @ValidateNested({ each: true })
    @Type(() => CreateProductRowDto)
    create?: CreateProductRowDto[];

    @IsArray()
    @IsOptional()
    @ArrayMaxSize(5000)
    @ValidateNested({ each: true })
    @Type(() => UpdateProductRowDto)
    update?: UpdateProductRowDto[];
}
