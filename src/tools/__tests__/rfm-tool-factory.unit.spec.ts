import { createSampleRepo } from "../../__tests__/fixtures/sample-dataset";
import RfmService from "../../modules/rfm/service";
import { createRfmTools } from "../rfm-tool-factory";

const findTool = (name: string) => {
  const tools = createRfmTools(new RfmService(createSampleRepo().repo));
  const tool = tools.find((candidate) => candidate.name === name);
  if (!tool) {
    throw new Error(`tool ${name} is not registered`);
  }
  return tool;
};

const payloadOf = (result: { content: Array<{ text: string }> }): unknown =>
  JSON.parse(result.content[0].text);

describe("rfm tools", () => {
  it("summarizes segments with the Pareto ordering", async () => {
    const result = await findTool("rfm_segment_summary").handler({});
    const payload = payloadOf(result);

    expect(payload).toMatchObject({
      anchor_date: "2018-03-11T10:00:00.000Z",
      customers: 3,
      available_segments: ["Champions", "Lost Customers", "Potential Loyalist"],
      summary: [
        { segment: "Champions", customer_count: 1, total_monetary: 1000, total_monetary_percent: 64.52 },
        { segment: "Lost Customers", customer_count: 1, total_monetary: 50, total_monetary_percent: 3.23 },
        { segment: "Potential Loyalist", customer_count: 1, total_monetary: 500, total_monetary_percent: 32.26 }
      ]
    });
    expect(payload).toHaveProperty(["pareto", 2, "cumulative_percent"], 100);
    expect(payload).toHaveProperty(["breakpoints", "frequency", "q80"], 4.2);
  });

  it("rejects unknown segment labels", async () => {
    const result = await findTool("rfm_segment_summary").handler({ segments: ["Whales"] });

    expect(result.isError).toBe(true);
    expect(payloadOf(result)).toEqual({
      error: {
        code: "invalid_segments",
        message: "Unknown segment(s): Whales",
        details: {
          unknown: ["Whales"],
          allowed: [
            "Champions",
            "Loyal",
            "Potential Loyalist",
            "Promising",
            "New Customers",
            "Need Attention",
            "About To Sleep",
            "At Risk",
            "Cannot Lose Them",
            "Hibernating Customers",
            "Lost Customers",
            "Other"
          ]
        }
      }
    });
  });

  it("pages through customer records filtered by segment", async () => {
    const result = await findTool("rfm_customers").handler({
      segments: ["Champions", "Potential Loyalist"],
      limit: 1,
      offset: 1
    });

    expect(payloadOf(result)).toEqual({
      anchor_date: "2018-03-11T10:00:00.000Z",
      total: 2,
      limit: 1,
      offset: 1,
      customers: [
        {
          customer_id: "cust-c",
          recency_days: 15,
          frequency: 3,
          monetary: 500,
          recency_score: 3,
          frequency_score: 3,
          monetary_score: 3,
          rfm_code: "333",
          segment: "Potential Loyalist"
        }
      ]
    });
  });

  it("lists order profiles for the filtered purchases", async () => {
    const result = await findTool("customer_order_profiles").handler({ states: ["RJ"] });

    expect(payloadOf(result)).toEqual({
      total: 1,
      limit: 100,
      offset: 0,
      profiles: [
        {
          customer_id: "cust-b",
          last_purchase_date: "2018-02-09T10:00:00.000Z",
          order_count: 1,
          total_monetary: 50
        }
      ]
    });
  });

  it("returns an empty segmentation for a window without deliveries", async () => {
    const result = await findTool("rfm_segment_summary").handler({
      start: "2019-01-01",
      end: "2019-12-31"
    });

    expect(payloadOf(result)).toEqual({
      anchor_date: null,
      customers: 0,
      breakpoints: null,
      available_segments: [],
      summary: [],
      pareto: []
    });
  });

  it("exposes the segment table without duplicate codes", async () => {
    const payload = payloadOf(await findTool("rfm_segment_table").handler({}));

    expect(payload).toHaveProperty("fallback", { id: "other", label: "Other" });
    expect(payload).toHaveProperty(["segments", 0, "label"], "Champions");
    expect(payload).toHaveProperty(["segments", 10, "label"], "Lost Customers");
  });
});
