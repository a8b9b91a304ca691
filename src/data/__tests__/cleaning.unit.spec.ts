import path from "node:path";
import { cleanDataset, fillOrderDates, fillProducts, NO_COMMENT, UNKNOWN_CATEGORY } from "../cleaning";
import { loadDataset } from "../csv-loader";

describe("cleanDataset", () => {
  it("fills the gaps of the sample tables", async () => {
    const dataset = cleanDataset(await loadDataset(path.join(__dirname, "fixtures")));

    expect(dataset.orderItems.map((item) => item.totalValue)).toEqual([200.5, 51]);
    expect(dataset.orderReviews[0]).toMatchObject({
      reviewCommentTitle: NO_COMMENT,
      reviewCommentMessage: "Chegou antes do prazo, recomendo"
    });

    const [delivered, canceled] = dataset.orders;
    expect(delivered.orderDeliveredCarrierDate).toEqual(new Date("2018-03-10T10:30:00Z"));
    expect(delivered.orderDeliveredCustomerDate).toEqual(new Date("2018-03-15T12:00:00Z"));
    expect(canceled.orderApprovedAt).toEqual(new Date("2018-02-09T10:00:00Z"));
    expect(canceled.orderDeliveredCarrierDate).toEqual(new Date("2018-02-09T10:00:00Z"));
    expect(canceled.orderDeliveredCustomerDate).toEqual(new Date("2018-02-09T10:00:00Z"));

    expect(dataset.products[1]).toEqual({
      productId: "prod-2",
      productCategoryName: UNKNOWN_CATEGORY,
      productNameLength: 45,
      productDescriptionLength: 400,
      productPhotosQty: 2,
      productWeightG: 700,
      productLengthCm: 25,
      productHeightCm: 15,
      productWidthCm: 20
    });
  });
});

describe("fillOrderDates", () => {
  it("leaves every date missing when there is no purchase timestamp", () => {
    const [order] = fillOrderDates([
      {
        orderId: "ord-1",
        customerId: "cust-1",
        orderStatus: "created",
        orderPurchaseTimestamp: null,
        orderApprovedAt: null,
        orderDeliveredCarrierDate: null,
        orderDeliveredCustomerDate: null,
        orderEstimatedDeliveryDate: null
      }
    ]);
    expect(order.orderDeliveredCustomerDate).toBeNull();
  });
});

describe("fillProducts", () => {
  it("uses 0 for a measurement no product has", () => {
    const [product] = fillProducts([
      {
        productId: "prod-1",
        productCategoryName: "moveis_decoracao",
        productNameLength: null,
        productDescriptionLength: null,
        productPhotosQty: null,
        productWeightG: null,
        productLengthCm: null,
        productHeightCm: null,
        productWidthCm: null
      }
    ]);
    expect(product).toEqual({
      productId: "prod-1",
      productCategoryName: "moveis_decoracao",
      productNameLength: 0,
      productDescriptionLength: 0,
      productPhotosQty: 0,
      productWeightG: 0,
      productLengthCm: 0,
      productHeightCm: 0,
      productWidthCm: 0
    });
  });
});
