import { isValid } from "date-fns";
import { fromZonedTime } from "date-fns-tz";
import { z } from "zod";
import type {
    Customer,
    DatasetTable,
    Geolocation,
    Order,
    OrderPayment,
    RawDataset,
    RawOrderItem,
    RawOrderReview,
    RawProduct,
    Seller
} from "../types/dataset";
import { toOptionalNumber } from "../utils/number";

const text = z.string().trim().min(1);

const optionalText = z
    .string()
    .trim()
    .transform((value) => (value === "" ? null : value));

const parseDecimal = (value: string, ctx: z.RefinementCtx): number => {
    const parsed = toOptionalNumber(value);
    if (parsed === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `expected a number, got "${value}"`
        });
        return z.NEVER;
    }
    return parsed;
};

const decimal = z.string().trim().min(1).transform(parseDecimal);

const optionalDecimal = z
    .string()
    .trim()
    .transform((value, ctx) => (value === "" ? null : parseDecimal(value, ctx)));

const integer = decimal.pipe(z.number().int());

/** Olist timestamps carry no zone; they are read as UTC. */
const timestamp = z
    .string()
    .trim()
    .transform((value, ctx): Date | null => {
        if (value === "") {
            return null;
        }
        const parsed = fromZonedTime(value, "UTC");
        if (!isValid(parsed)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `expected a timestamp, got "${value}"`
            });
            return z.NEVER;
        }
        return parsed;
    });

export const customerRowSchema = z
    .object({
        customer_id: text,
        customer_unique_id: text,
        customer_zip_code_prefix: text,
        customer_city: text,
        customer_state: text
    })
    .transform(
        (row): Customer => ({
            customerId: row.customer_id,
            customerUniqueId: row.customer_unique_id,
            customerZipCodePrefix: row.customer_zip_code_prefix,
            customerCity: row.customer_city,
            customerState: row.customer_state
        })
    );

export const geolocationRowSchema = z
    .object({
        geolocation_zip_code_prefix: text,
        geolocation_lat: decimal,
        geolocation_lng: decimal,
        geolocation_city: text,
        geolocation_state: text
    })
    .transform(
        (row): Geolocation => ({
            zipCodePrefix: row.geolocation_zip_code_prefix,
            lat: row.geolocation_lat,
            lng: row.geolocation_lng,
            city: row.geolocation_city,
            state: row.geolocation_state
        })
    );

export const orderItemRowSchema = z
    .object({
        order_id: text,
        order_item_id: integer,
        product_id: text,
        seller_id: text,
        shipping_limit_date: timestamp,
        price: decimal,
        freight_value: decimal
    })
    .transform(
        (row): RawOrderItem => ({
            orderId: row.order_id,
            orderItemId: row.order_item_id,
            productId: row.product_id,
            sellerId: row.seller_id,
            shippingLimitDate: row.shipping_limit_date,
            price: row.price,
            freightValue: row.freight_value
        })
    );

export const orderPaymentRowSchema = z
    .object({
        order_id: text,
        payment_sequential: integer,
        payment_type: text,
        payment_installments: integer,
        payment_value: decimal
    })
    .transform(
        (row): OrderPayment => ({
            orderId: row.order_id,
            paymentSequential: row.payment_sequential,
            paymentType: row.payment_type,
            paymentInstallments: row.payment_installments,
            paymentValue: row.payment_value
        })
    );

export const orderReviewRowSchema = z
    .object({
        review_id: text,
        order_id: text,
        review_score: integer.pipe(z.number().min(1).max(5)),
        review_comment_title: optionalText,
        review_comment_message: optionalText,
        review_creation_date: timestamp,
        review_answer_timestamp: timestamp
    })
    .transform(
        (row): RawOrderReview => ({
            reviewId: row.review_id,
            orderId: row.order_id,
            reviewScore: row.review_score,
            reviewCommentTitle: row.review_comment_title,
            reviewCommentMessage: row.review_comment_message,
            reviewCreationDate: row.review_creation_date,
            reviewAnswerTimestamp: row.review_answer_timestamp
        })
    );

export const orderRowSchema = z
    .object({
        order_id: text,
        customer_id: text,
        order_status: text,
        order_purchase_timestamp: timestamp,
        order_approved_at: timestamp,
        order_delivered_carrier_date: timestamp,
        order_delivered_customer_date: timestamp,
        order_estimated_delivery_date: timestamp
    })
    .transform(
        (row): Order => ({
            orderId: row.order_id,
            customerId: row.customer_id,
            orderStatus: row.order_status,
            orderPurchaseTimestamp: row.order_purchase_timestamp,
            orderApprovedAt: row.order_approved_at,
            orderDeliveredCarrierDate: row.order_delivered_carrier_date,
            orderDeliveredCustomerDate: row.order_delivered_customer_date,
            orderEstimatedDeliveryDate: row.order_estimated_delivery_date
        })
    );

// Column names keep the dataset's own "lenght" spelling.
export const productRowSchema = z
    .object({
        product_id: text,
        product_category_name: optionalText,
        product_name_lenght: optionalDecimal,
        product_description_lenght: optionalDecimal,
        product_photos_qty: optionalDecimal,
        product_weight_g: optionalDecimal,
        product_length_cm: optionalDecimal,
        product_height_cm: optionalDecimal,
        product_width_cm: optionalDecimal
    })
    .transform(
        (row): RawProduct => ({
            productId: row.product_id,
            productCategoryName: row.product_category_name,
            productNameLength: row.product_name_lenght,
            productDescriptionLength: row.product_description_lenght,
            productPhotosQty: row.product_photos_qty,
            productWeightG: row.product_weight_g,
            productLengthCm: row.product_length_cm,
            productHeightCm: row.product_height_cm,
            productWidthCm: row.product_width_cm
        })
    );

export const sellerRowSchema = z
    .object({
        seller_id: text,
        seller_zip_code_prefix: text,
        seller_city: text,
        seller_state: text
    })
    .transform(
        (row): Seller => ({
            sellerId: row.seller_id,
            sellerZipCodePrefix: row.seller_zip_code_prefix,
            sellerCity: row.seller_city,
            sellerState: row.seller_state
        })
    );

export type TableSchemas = {
    [K in DatasetTable]: z.ZodType<RawDataset[K][number], z.ZodTypeDef, unknown>;
};

export const TABLE_SCHEMAS: TableSchemas = {
    customers: customerRowSchema,
    geolocation: geolocationRowSchema,
    orderItems: orderItemRowSchema,
    orderPayments: orderPaymentRowSchema,
    orderReviews: orderReviewRowSchema,
    orders: orderRowSchema,
    products: productRowSchema,
    sellers: sellerRowSchema
};
