import { Type } from 'class-transformer';
import { IsDefined, IsObject, IsOptional, IsString, ValidateNested } from 'class-validator';

class NavigationContextDto {
    @IsString({ message: 'groupId must be a string.' })
    @IsOptional()
    groupId?: string;

    @IsString({ message: 'variantId must be a string.' })
    @IsOptional()
    variantId?: string;
}

export class NavigationQueryDto {
    @IsDefined({ message: 'context is required.' })
    @ValidateNested()
    @Type(() => NavigationContextDto)
    context!: NavigationContextDto;

    // attribute slug -> value, null unpins
    @IsObject({ message: 'overrides must be an object.' })
    @IsOptional()
    overrides?: Record<string, unknown>;
}
