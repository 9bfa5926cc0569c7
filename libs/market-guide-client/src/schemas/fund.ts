import { z } from 'zod';
import { list, numeric, opt, record } from '../records';
import { OpaqueSchema } from './common';

export const FundPerformanceSchema = record({
  today: opt(z.number()),
  oneWeek: opt(z.number()),
  oneMonth: opt(z.number()),
  threeMonths: opt(z.number()),
  thisYear: opt(z.number()),
  oneYear: opt(z.number()),
  threeYears: opt(z.number()),
  fiveYears: opt(z.number()),
  tenYears: opt(z.number()),
});

export const FundFeeSchema = record({
  ongoingCharges: opt(z.number()),
  entryCharge: opt(z.number()),
  exitCharge: opt(z.number()),
});

export const AllocationSchema = record({
  name: opt(z.string()),
  y: opt(z.number()),
});
export type Allocation = z.infer<typeof AllocationSchema>;

export const FundInfoSchema = record({
  id: opt(z.string()),
  name: z.string(),
  isin: opt(z.string()),
  description: opt(z.string()),
  nav: opt(numeric),
  navDate: opt(z.string()),
  currency: opt(z.string()),
  development: opt(FundPerformanceSchema),
  changeSinceThreeMonths: opt(z.number()),
  changeSinceOneYear: opt(z.number()),
  risk: opt(z.number()),
  riskLevel: opt(z.string()),
  rating: opt(z.number()),
  standardDeviation: opt(z.number()),
  sharpeRatio: opt(z.number()),
  fee: opt(FundFeeSchema),
  fundCompany: opt(z.union([z.string(), OpaqueSchema])),
  fundTypeName: opt(z.string()),
  category: opt(z.string()),
  capital: opt(numeric),
  startDate: opt(z.string()),
  tradeable: opt(z.boolean()),
  buyFee: opt(z.number()),
  sellFee: opt(z.number()),
  prospectus: opt(z.string()),
  countryChartData: list(AllocationSchema),
  sectorChartData: list(AllocationSchema),
  holdingChartData: list(AllocationSchema),
  portfolioDate: opt(z.string()),
  lastUpdated: opt(z.string()),
});
export type FundInfo = z.infer<typeof FundInfoSchema>;

export interface FundHoldings {
  countryChartData: Allocation[];
  sectorChartData: Allocation[];
  holdingChartData: Allocation[];
  portfolioDate: string | null;
}

export const ProductInvolvementSchema = record({
  product: opt(z.string()),
  productDescription: opt(z.string()),
  value: opt(z.number()),
  name: opt(z.string()),
});

export const SustainabilityGoalSchema = record({
  goalId: opt(z.number()),
  goalName: opt(z.string()),
  goalDescription: opt(z.string()),
});

export const FundSustainabilitySchema = record({
  lowCarbon: opt(z.boolean()),
  esgScore: opt(z.number()),
  environmentalScore: opt(z.number()),
  socialScore: opt(z.number()),
  governanceScore: opt(z.number()),
  controversyScore: opt(z.number()),
  carbonSolutionsInvolvement: opt(z.number()),
  productInvolvements: list(ProductInvolvementSchema),
  sustainabilityRating: opt(z.number()),
  sustainabilityRatingCategoryName: opt(z.string()),
  oilSandsExtractionInvolvement: opt(z.number()),
  arcticOilAndGasExplorationInvolvement: opt(z.number()),
  thermalCoalPowerGenerationInvolvement: opt(z.number()),
  thermalCoalInvolvement: opt(z.number()),
  oilAndGasProductionInvolvement: opt(z.number()),
  environmentalRating: opt(z.number()),
  socialRating: opt(z.number()),
  governanceRating: opt(z.number()),
  svanen: opt(z.boolean()),
  euArticleType: opt(z.union([z.string(), OpaqueSchema])),
  aumCoveredCarbon: opt(z.number()),
  fossilFuelInvolvement: opt(z.number()),
  carbonRiskScore: opt(z.number()),
  sustainabilityDevelopmentGoals: list(SustainabilityGoalSchema),
});
export type FundSustainability = z.infer<typeof FundSustainabilitySchema>;

export const FundChartPointSchema = record({
  x: z.number(),
  y: opt(z.number()),
});

export const FundChartSchema = record({
  id: opt(z.string()),
  name: opt(z.string()),
  dataSerie: list(FundChartPointSchema),
  fromDate: opt(z.string()),
  toDate: opt(z.string()),
});
export type FundChart = z.infer<typeof FundChartSchema>;

export const FundChartPeriodSchema = record({
  timePeriod: z.string(),
  change: opt(z.number()),
  startDate: opt(z.string()),
});
export type FundChartPeriod = z.infer<typeof FundChartPeriodSchema>;

export const FundDescriptionSchema = record({
  response: opt(z.string()),
  heading: opt(z.string()),
  detailedCategoryDescription: opt(z.string()),
});
export type FundDescription = z.infer<typeof FundDescriptionSchema>;
