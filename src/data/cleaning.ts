import type {
    Dataset,
    Order,
    OrderItem,
    OrderReview,
    Product,
    ProductMeasurements,
    RawDataset,
    RawOrderItem,
    RawOrderReview,
    RawProduct
} from "../types/dataset";
import { median } from "../utils/number";

export const NO_COMMENT = "no comment";
export const UNKNOWN_CATEGORY = "unknown";

const MEASUREMENT_KEYS: Array<keyof ProductMeasurements> = [
    "productNameLength",
    "productDescriptionLength",
    "productPhotosQty",
    "productWeightG",
    "productLengthCm",
    "productHeightCm",
    "productWidthCm"
];

export function withTotalValue(items: readonly RawOrderItem[]): OrderItem[] {
    return items.map((item) => ({
        ...item,
        totalValue: item.price + item.freightValue
    }));
}

/** Missing milestone dates inherit the previous milestone. */
export function fillOrderDates(orders: readonly Order[]): Order[] {
    return orders.map((order) => {
        const orderApprovedAt =
            order.orderApprovedAt ?? order.orderPurchaseTimestamp;
        const orderDeliveredCarrierDate =
            order.orderDeliveredCarrierDate ?? orderApprovedAt;
        const orderDeliveredCustomerDate =
            order.orderDeliveredCustomerDate ?? orderDeliveredCarrierDate;
        return {
            ...order,
            orderApprovedAt,
            orderDeliveredCarrierDate,
            orderDeliveredCustomerDate
        };
    });
}

export function fillReviewComments(
    reviews: readonly RawOrderReview[]
): OrderReview[] {
    return reviews.map((review) => ({
        ...review,
        reviewCommentTitle: review.reviewCommentTitle ?? NO_COMMENT,
        reviewCommentMessage: review.reviewCommentMessage ?? NO_COMMENT
    }));
}

/**
 * Missing categories become "unknown"; missing measurements take the median
 * of the values present in that column (0 when the column is empty).
 */
export function fillProducts(products: readonly RawProduct[]): Product[] {
    const medians = new Map<keyof ProductMeasurements, number>();
    for (const key of MEASUREMENT_KEYS) {
        const present: number[] = [];
        for (const product of products) {
            const value = product[key];
            if (value !== null) {
                present.push(value);
            }
        }
        medians.set(key, median(present) ?? 0);
    }

    const fill = (product: RawProduct, key: keyof ProductMeasurements): number =>
        product[key] ?? medians.get(key) ?? 0;

    return products.map((product) => ({
        productId: product.productId,
        productCategoryName: product.productCategoryName ?? UNKNOWN_CATEGORY,
        productNameLength: fill(product, "productNameLength"),
        productDescriptionLength: fill(product, "productDescriptionLength"),
        productPhotosQty: fill(product, "productPhotosQty"),
        productWeightG: fill(product, "productWeightG"),
        productLengthCm: fill(product, "productLengthCm"),
        productHeightCm: fill(product, "productHeightCm"),
        productWidthCm: fill(product, "productWidthCm")
    }));
}

export function cleanDataset(raw: RawDataset): Dataset {
    return {
        customers: raw.customers,
        geolocation: raw.geolocation,
        orderItems: withTotalValue(raw.orderItems),
        orderPayments: raw.orderPayments,
        orderReviews: fillReviewComments(raw.orderReviews),
        orders: fillOrderDates(raw.orders),
        products: fillProducts(raw.products),
        sellers: raw.sellers
    };
}
