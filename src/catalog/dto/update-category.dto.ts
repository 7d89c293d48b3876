import { IsOptional, IsString, Length } from 'class-validator';

export class UpdateCategoryDto {
    @IsString({ message: 'Category name must be a string.' })
    @IsOptional()
    @Length(1, 255, { message: 'Category name must be between 1 and 255 characters.' })
    name?: string;

    // null moves the category to the root
    @IsString({ message: 'parentId must be a string or null.' })
    @IsOptional()
    parentId?: string | null;
}
