import { ArrayMaxSize, IsArray, IsInt, IsOptional, IsString, Min } from 'class-validator';

export class CategoryProductsDto {
    @IsArray({ message: 'add must be an array of product ids.' })
    @IsString({ each: true })
    @IsOptional()
    @ArrayMaxSize(1000)
    add?: string[];

    @IsArray({ message: 'remove must be an array of product ids.' })
    @IsString({ each: true })
    @IsOptional()
    @ArrayMaxSize(1000)
    remove?: string[];
}

export class SetProductCategoriesDto {
    @IsArray({ message: 'categoryIds must be an array.' })
    @IsString({ each: true })
    categoryIds!: string[];

    @IsInt({ message: 'version must be an integer.' })
    @Min(0)
    version!: number;
}
