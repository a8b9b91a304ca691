export type Customer = {
    customerId: string;
    customerUniqueId: string;
    customerZipCodePrefix: string;
    customerCity: string;
    customerState: string;
};

export type Geolocation = {
    zipCodePrefix: string;
    lat: number;
    lng: number;
    city: string;
    state: string;
};

export type Order = {
    orderId: string;
    customerId: string;
    orderStatus: string;
    orderPurchaseTimestamp: Date | null;
    orderApprovedAt: Date | null;
    orderDeliveredCarrierDate: Date | null;
    orderDeliveredCustomerDate: Date | null;
    orderEstimatedDeliveryDate: Date | null;
};

export type RawOrderItem = {
    orderId: string;
    orderItemId: number;
    productId: string;
    sellerId: string;
    shippingLimitDate: Date | null;
    price: number;
    freightValue: number;
};

export type OrderItem = RawOrderItem & {
    /** price + freightValue */
    totalValue: number;
};

export type OrderPayment = {
    orderId: string;
    paymentSequential: number;
    paymentType: string;
    paymentInstallments: number;
    paymentValue: number;
};

export type RawOrderReview = {
    reviewId: string;
    orderId: string;
    reviewScore: number;
    reviewCommentTitle: string | null;
    reviewCommentMessage: string | null;
    reviewCreationDate: Date | null;
    reviewAnswerTimestamp: Date | null;
};

export type OrderReview = Omit<
    RawOrderReview,
    "reviewCommentTitle" | "reviewCommentMessage"
> & {
    reviewCommentTitle: string;
    reviewCommentMessage: string;
};

export type ProductMeasurements = {
    productNameLength: number | null;
    productDescriptionLength: number | null;
    productPhotosQty: number | null;
    productWeightG: number | null;
    productLengthCm: number | null;
    productHeightCm: number | null;
    productWidthCm: number | null;
};

export type RawProduct = ProductMeasurements & {
    productId: string;
    productCategoryName: string | null;
};

export type Product = {
    productId: string;
    productCategoryName: string;
} & { [K in keyof ProductMeasurements]: number };

export type Seller = {
    sellerId: string;
    sellerZipCodePrefix: string;
    sellerCity: string;
    sellerState: string;
};

export type RawDataset = {
    customers: Customer[];
    geolocation: Geolocation[];
    orderItems: RawOrderItem[];
    orderPayments: OrderPayment[];
    orderReviews: RawOrderReview[];
    orders: Order[];
    products: RawProduct[];
    sellers: Seller[];
};

export type Dataset = {
    customers: Customer[];
    geolocation: Geolocation[];
    orderItems: OrderItem[];
    orderPayments: OrderPayment[];
    orderReviews: OrderReview[];
    orders: Order[];
    products: Product[];
    sellers: Seller[];
};

export type DatasetTable = keyof RawDataset;

/** An order that survived the dashboard filters, with its customer's location. */
export type FilteredOrder = Order & {
    customerCity: string;
    customerState: string;
};

export type FilteredDataset = {
    orders: FilteredOrder[];
    orderItems: OrderItem[];
    orderPayments: OrderPayment[];
    orderReviews: OrderReview[];
    products: Product[];
    geolocation: Geolocation[];
};

export type DashboardFilters = {
    /** Inclusive, `YYYY-MM-DD`, compared on the UTC purchase date. */
    startDate?: string;
    endDate?: string;
    states?: string[];
    cities?: string[];
};
