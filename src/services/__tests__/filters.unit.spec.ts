import { buildRawDataset } from "../../__tests__/fixtures/sample-dataset";
import { cleanDataset } from "../../data/cleaning";
import { ToolError } from "../../utils/error";
import { applyFilters, listFilterOptions, normalizeFilters, toDayKey } from "../filters";

const dataset = cleanDataset(buildRawDataset());

describe("normalizeFilters", () => {
  it("sorts and de-duplicates locations and drops empty lists", () => {
    expect(
      normalizeFilters({ startDate: "2018-01-01", states: ["SP", "RJ", "SP"], cities: [] })
    ).toEqual({ startDate: "2018-01-01", states: ["RJ", "SP"] });
  });

  it("rejects dates that are not YYYY-MM-DD", () => {
    expect(() => normalizeFilters({ startDate: "2018-1-1" })).toThrow(ToolError);
    expect(() => normalizeFilters({ endDate: "2018-02-30" })).toThrow(
      'endDate must be a calendar date (YYYY-MM-DD), got "2018-02-30"'
    );
  });

  it("rejects a start after the end", () => {
    try {
      normalizeFilters({ startDate: "2018-03-02", endDate: "2018-03-01" });
      throw new Error("expected normalizeFilters to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ToolError);
      expect(error).toMatchObject({ code: "invalid_filters" });
    }
  });
});

describe("applyFilters", () => {
  it("keeps everything joined to a customer when no filter is set", () => {
    const view = applyFilters(dataset);
    expect(view.orders).toHaveLength(10);
    expect(view.orders[0]).toMatchObject({
      orderId: "ord-a1",
      customerCity: "sao paulo",
      customerState: "SP"
    });
    expect(view.orderItems).toHaveLength(11);
  });

  it("filters on the inclusive UTC purchase day", () => {
    const view = applyFilters(dataset, { startDate: "2018-03-01", endDate: "2018-03-10" });
    expect(view.orders.map((order) => order.orderId)).toEqual(["ord-a1", "ord-a2", "ord-d1"]);
    expect(view.orderPayments.map((payment) => payment.orderId)).toEqual([
      "ord-a1",
      "ord-a2",
      "ord-d1"
    ]);
    expect(view.orderReviews.map((review) => review.reviewId)).toEqual(["rev-1", "rev-4"]);
  });

  it("filters on customer state and city", () => {
    expect(applyFilters(dataset, { states: ["RJ"] }).orders.map((order) => order.orderId)).toEqual([
      "ord-b1"
    ]);
    expect(
      applyFilters(dataset, { states: ["SP"], cities: ["campinas"] }).orders.map(
        (order) => order.orderId
      )
    ).toEqual(["ord-c1", "ord-c2", "ord-c3"]);
  });

  it("drops orders without a purchase date once a date bound is set", () => {
    const withUndated = {
      ...dataset,
      orders: [...dataset.orders, { ...dataset.orders[0], orderId: "ord-x", orderPurchaseTimestamp: null }]
    };
    expect(applyFilters(withUndated).orders).toHaveLength(11);
    expect(applyFilters(withUndated, { endDate: "2018-12-31" }).orders).toHaveLength(10);
  });
});

describe("listFilterOptions", () => {
  it("lists the date bounds, states and cities", () => {
    expect(listFilterOptions(dataset)).toEqual({
      minDate: "2018-01-15",
      maxDate: "2018-03-10",
      states: ["RJ", "SP"],
      cities: ["campinas", "rio de janeiro", "sao paulo"]
    });
  });

  it("narrows the cities to the given states", () => {
    expect(listFilterOptions(dataset, ["RJ"]).cities).toEqual(["rio de janeiro"]);
  });
});

describe("toDayKey", () => {
  it("uses the UTC calendar day", () => {
    expect(toDayKey(new Date("2018-03-10T23:30:00-03:00"))).toBe("2018-03-11");
  });
});
