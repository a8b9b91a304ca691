export type CustomerId = string;

export type RfmOrderInput = {
  orderId: string;
  customerId: CustomerId;
  orderStatus: string;
  orderPurchaseTimestamp: Date | null;
};

export type RfmOrderItemInput = {
  orderId: string;
  productId: string;
  price: number;
  freightValue: number;
};

export type CustomerOrderProfile = {
  customerId: CustomerId;
  lastPurchaseDate: Date | null;
  orderCount: number;
  totalMonetary: number;
};

export type RawMetricRecord = {
  customerId: CustomerId;
  recencyDays: number;
  frequency: number;
  monetary: number;
};

export type RecencyResult = {
  anchorDate: Date | null;
  records: RawMetricRecord[];
};

export type Breakpoints = {
  q20: number;
  q40: number;
  q60: number;
  q80: number;
};

export type QuintileDistribution = {
  recency: Breakpoints;
  frequency: Breakpoints;
  monetary: Breakpoints;
};

export type Score = 1 | 2 | 3 | 4 | 5;

export type QuintileScores = {
  recencyScore: Score;
  frequencyScore: Score;
  monetaryScore: Score;
};

export type RfmRecord = RawMetricRecord &
  QuintileScores & {
    rfmCode: string;
    segment: string;
  };

export type SegmentSummary = {
  segment: string;
  customerCount: number;
  totalMonetary: number;
  totalMonetaryPercent: number;
  totalMonetaryScaled: number;
};

export type ParetoSegmentSummary = SegmentSummary & {
  cumulativePercent: number;
};

export type RfmReport = {
  anchorDate: Date | null;
  breakpoints: QuintileDistribution | null;
  profiles: CustomerOrderProfile[];
  records: RfmRecord[];
  availableSegments: string[];
  summary: SegmentSummary[];
  pareto: ParetoSegmentSummary[];
};
