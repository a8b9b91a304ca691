import { computeRecency, resolveAnchorDate } from "../lib/recency";
import { CustomerOrderProfile } from "../lib/types";

const profile = (
  customerId: string,
  lastPurchase: string | null,
  orderCount = 1,
  totalMonetary = 10
): CustomerOrderProfile => ({
  customerId,
  lastPurchaseDate: lastPurchase ? new Date(lastPurchase) : null,
  orderCount,
  totalMonetary
});

describe("recency", () => {
  it("anchors one day after the latest purchase", () => {
    const anchor = resolveAnchorDate([
      profile("cust-a", "2018-03-10T10:00:00Z"),
      profile("cust-b", "2018-02-09T10:00:00Z")
    ]);
    expect(anchor).toEqual(new Date("2018-03-11T10:00:00Z"));
  });

  it("has no anchor when no purchase date exists", () => {
    expect(resolveAnchorDate([])).toBeNull();
    expect(resolveAnchorDate([profile("cust-a", null)])).toBeNull();
  });

  it("counts whole days back from the anchor", () => {
    const { anchorDate, records } = computeRecency([
      profile("cust-a", "2018-03-10T10:00:00Z", 5, 1000),
      profile("cust-b", "2018-02-09T10:00:00Z", 1, 50),
      profile("cust-c", "2018-02-09T12:00:00Z", 3, 500)
    ]);

    expect(anchorDate).toEqual(new Date("2018-03-11T10:00:00Z"));
    expect(records).toEqual([
      { customerId: "cust-a", recencyDays: 1, frequency: 5, monetary: 1000 },
      { customerId: "cust-b", recencyDays: 30, frequency: 1, monetary: 50 },
      // 29 days and 22 hours
      { customerId: "cust-c", recencyDays: 29, frequency: 3, monetary: 500 }
    ]);
  });

  it("gives customers without a date a recency of zero", () => {
    const { records } = computeRecency([
      profile("cust-a", "2018-03-10T10:00:00Z"),
      profile("cust-b", null)
    ]);
    expect(records.map((record) => record.recencyDays)).toEqual([1, 0]);
  });
});
