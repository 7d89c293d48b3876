import {
    Body,
    Controller,
    Get,
    Headers,
    HttpCode,
    HttpStatus,
    Logger,
    Param,
    Patch,
    Post,
    Put,
    Query,
    UsePipes,
    ValidationPipe,
} from '@nestjs/common';
import { BulkSaveReport, CatalogSyncService, RowReport } from './catalog-sync.service';
import { CategoryMembershipService, MembershipTransferReport } from './category-membership.service';
import { CategoryTreeNode, CategoryTreeService } from './category-tree.service';
import { Category } from './entities/category.entity';
import { SerializedFacets } from './facets/facet-serializer';
import { NavigationResult } from './navigation/navigation-resolver.service';
import { ProductReadModel, ProductReadModelService } from './product-read-model.service';
import { BulkSaveDto } from './dto/bulk-save.dto';
import { CategoryProductsDto, SetProductCategoriesDto } from './dto/category-membership.dto';
import { NavigationQueryDto } from './dto/navigation-query.dto';
import { UpdateCategoryDto } from './dto/update-category.dto';

@Controller('catalog')
@UsePipes(new ValidationPipe({ whitelist: true, transform: true }))
export class CatalogController {
    private readonly logger = new Logger(CatalogController.name);

    constructor(
        private readonly catalogSyncService: CatalogSyncService,
        private readonly readModelService: ProductReadModelService,
        private readonly membershipService: CategoryMembershipService,
        private readonly categoryTreeService: CategoryTreeService,
    ) {}

    @Post('products/bulk-save')
    @HttpCode(HttpStatus.OK)
    async bulkSave(@Body() body: BulkSaveDto, @Headers('x-user-id') userId?: string): Promise<BulkSaveReport> {
        const report = await this.catalogSyncService.saveProducts(body, userId ?? null);
        this.logger.log(`Bulk save by ${userId ?? 'anonymous'}: ${report.saved} saved, ${report.unchanged} unchanged, ${report.failed} failed`);
        return report;
    }

    @Get('products/:id')
    async getProduct(@Param('id') productId: string): Promise<ProductReadModel> {
        return this.readModelService.getProduct(productId);
    }

    @Get('products/:id/facets')
    async getFacets(@Param('id') productId: string): Promise<SerializedFacets> {
        return this.readModelService.getFacets(productId);
    }

    @Post('products/:id/navigate')
    @HttpCode(HttpStatus.OK)
    async navigate(@Param('id') productId: string, @Body() body: NavigationQueryDto): Promise<NavigationResult> {
        return this.readModelService.navigate(productId, {
            context: { groupId: body.context.groupId, variantId: body.context.variantId },
            overrides: body.overrides,
        });
    }

    @Put('products/:id/categories')
    async setProductCategories(
        @Param('id') productId: string,
        @Body() body: SetProductCategoriesDto,
        @Headers('x-user-id') userId?: string,
    ): Promise<RowReport> {
        return this.membershipService.setProductCategories(productId, body.categoryIds, body.version, userId ?? null);
    }

    @Get('categories')
    async listCategories(@Query('search') search?: string): Promise<CategoryTreeNode[]> {
        return this.categoryTreeService.listTree(search);
    }

    @Post('categories/:id/products')
    @HttpCode(HttpStatus.OK)
    async updateCategoryProducts(
        @Param('id') categoryId: string,
        @Body() body: CategoryProductsDto,
        @Headers('x-user-id') userId?: string,
    ): Promise<MembershipTransferReport> {
        return this.membershipService.updateCategoryProducts(categoryId, body, userId ?? null);
    }

    @Patch('categories/:id')
    async updateCategory(
        @Param('id') categoryId: string,
        @Body() body: UpdateCategoryDto,
        @Headers('x-user-id') userId?: string,
    ): Promise<Category> {
        return this.categoryTreeService.updateCategory(categoryId, body, userId ?? null);
    }
}
