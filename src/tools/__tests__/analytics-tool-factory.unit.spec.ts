import { createSampleRepo } from "../../__tests__/fixtures/sample-dataset";
import { createAnalyticsService } from "../../services/analytics-service";
import { createAnalyticsTools } from "../analytics-tool-factory";

const findTool = (name: string) => {
  const tools = createAnalyticsTools(createAnalyticsService(createSampleRepo().repo));
  const tool = tools.find((candidate) => candidate.name === name);
  if (!tool) {
    throw new Error(`tool ${name} is not registered`);
  }
  return tool;
};

const payloadOf = (result: { content: Array<{ text: string }> }): unknown =>
  JSON.parse(result.content[0].text);

describe("analytics tools", () => {
  it("registers every dashboard aggregation", () => {
    const tools = createAnalyticsTools(createAnalyticsService(createSampleRepo().repo));
    expect(tools.map((tool) => tool.name)).toEqual([
      "filter_options",
      "order_status_distribution",
      "orders_over_time",
      "payment_type_distribution",
      "review_score_distribution",
      "top_product_categories",
      "top_sellers",
      "top_locations"
    ]);
  });

  it("passes a stubbed service the coerced filters", async () => {
    const analytics = {
      ...createAnalyticsService(createSampleRepo().repo),
      orderStatusDistribution: jest.fn().mockResolvedValue([{ status: "delivered", total: 8 }])
    };
    const tool = createAnalyticsTools(analytics).find(
      (candidate) => candidate.name === "order_status_distribution"
    );

    const result = await tool?.handler({ from: "2018-01-01", to: "2018-01-31", states: ["SP"] });

    expect(analytics.orderStatusDistribution).toHaveBeenCalledWith({
      startDate: "2018-01-01",
      endDate: "2018-01-31",
      states: ["SP"]
    });
    expect(result && payloadOf(result)).toEqual({ rows: [{ status: "delivered", total: 8 }] });
  });

  it("returns snake_case rows for payment types", async () => {
    const result = await findTool("payment_type_distribution").handler({});
    expect(payloadOf(result)).toEqual({
      rows: [
        { payment_type: "credit_card", total: 3 },
        { payment_type: "boleto", total: 2 },
        { payment_type: "voucher", total: 1 }
      ]
    });
  });

  it("defaults orders_over_time to daily buckets", async () => {
    const result = await findTool("orders_over_time").handler({
      start_date: "2018-03-01",
      end_date: "2018-03-05"
    });
    expect(payloadOf(result)).toEqual({
      granularity: "daily",
      rows: [
        { period: "2018-03-01", count: 1 },
        { period: "2018-03-05", count: 1 }
      ]
    });
  });

  it("reports invalid filters", async () => {
    const result = await findTool("top_sellers").handler({ start: "2018-03-05", end: "2018-03-01" });
    expect(result.isError).toBe(true);
    expect(payloadOf(result)).toMatchObject({ error: { code: "invalid_filters" } });
  });

  it("rejects a limit outside 5..50", async () => {
    const result = await findTool("top_locations").handler({ limit: 100 });
    expect(payloadOf(result)).toMatchObject({ error: { code: "invalid_input" } });
  });

  it("returns locations with orders_count and total_value", async () => {
    const result = await findTool("top_locations").handler({ states: ["RJ"], limit: 5 });
    expect(payloadOf(result)).toEqual({
      rows: [
        {
          location: "Rio De Janeiro, RJ",
          city: "rio de janeiro",
          state: "RJ",
          lat: -22.9,
          lng: -43.2,
          orders_count: 1,
          total_value: 50
        }
      ]
    });
  });

  it("lists filter options with snake_case bounds", async () => {
    const result = await findTool("filter_options").handler({ states: ["RJ"] });
    expect(payloadOf(result)).toEqual({
      min_date: "2018-01-15",
      max_date: "2018-03-10",
      states: ["RJ", "SP"],
      cities: ["rio de janeiro"]
    });
  });
});
