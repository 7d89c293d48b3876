import { Product } from './entities/product.entity';
import { Variant } from './entities/variant.entity';

export interface ProductStats {
    price_min: number | null; // null only for a variantless product without a sale price
    price_max: number | null;
    price_avg: number | null;
    stock_min: number;
    stock_max: number;
    stock_avg: number;
    stock_sum: number;
    variant_count: number;
}

const round = (value: number, decimals: number): number => {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
};

/**
 * Aggregates over the active variants' sale price and stock. A product without active
 * variants is its own single implicit variant, so its scalar fields are mirrored.
 */
export function computeProductStats(product: Pick<Product, 'SalePrice' | 'StockQty'>, activeVariants: Variant[]): ProductStats {
    if (activeVariants.length === 0) {
        const price = product.SalePrice;
        const stock = product.StockQty;
        return {
            price_min: price,
            price_max: price,
            price_avg: price === null ? null : round(price, 2),
            stock_min: stock,
            stock_max: stock,
            stock_avg: round(stock, 1),
            stock_sum: stock,
            variant_count: 0,
        };
    }

    const prices = activeVariants.map((variant) => variant.SalePrice);
    const stocks = activeVariants.map((variant) => variant.StockQty);
    const priceSum = prices.reduce((sum, price) => sum + price, 0);
    const stockSum = stocks.reduce((sum, stock) => sum + stock, 0);

    return {
        price_min: Math.min(...prices),
        price_max: Math.max(...prices),
        price_avg: round(priceSum / prices.length, 2),
        stock_min: Math.min(...stocks),
        stock_max: Math.max(...stocks),
        stock_avg: round(stockSum / stocks.length, 1),
        stock_sum: stockSum,
        variant_count: activeVariants.length,
    };
}
