import type { ProductRow, ReviewRow } from "../dataset/types";
import { toMonthKey } from "../lib/dates";
import { linearSlope, mean, sampleStd } from "../lib/stats";

export type SentimentLabel = "positive" | "negative" | "neutral";

export type ProductSentiment = {
  product_id: string;
  product_name: string | null;
  total_reviews: number;
  positive_count: number;
  negative_count: number;
  neutral_count: number;
  positive_pct: number;
  negative_pct: number;
  /** null when no review carries a rating. */
  avg_rating: number | null;
  /** Sample standard deviation of ratings; null below two ratings. */
  rating_volatility: number | null;
};

export type MonthlySentiment = {
  month: string;
  reviews: number;
  avg_rating: number | null;
  positive_pct: number;
  negative_pct: number;
  neutral_pct: number;
};

export type SentimentResult = {
  byProduct: ProductSentiment[];
  monthlyTrends: MonthlySentiment[];
  /** Change in average rating per month across rated months; null below two. */
  ratingTrend: number | null;
  warnings: string[];
};

export function normalizeSentiment(value: string | null): SentimentLabel | null {
  const label = value?.trim().toLowerCase();
  if (label === "positive" || label === "negative" || label === "neutral") return label;
  return null;
}

type Tally = { reviews: number; ratings: number[]; positive: number; negative: number; neutral: number };

function tally(reviews: readonly ReviewRow[]): Tally {
  const counts: Tally = { reviews: 0, ratings: [], positive: 0, negative: 0, neutral: 0 };
  for (const review of reviews) {
    counts.reviews += 1;
    if (review.rating !== null) counts.ratings.push(review.rating);
    const label = normalizeSentiment(review.sentiment);
    if (label) counts[label] += 1;
  }
  return counts;
}

function groupBy(reviews: readonly ReviewRow[], keyOf: (review: ReviewRow) => string): Map<string, ReviewRow[]> {
  const groups = new Map<string, ReviewRow[]>();
  for (const review of reviews) {
    const key = keyOf(review);
    const list = groups.get(key) ?? [];
    list.push(review);
    groups.set(key, list);
  }
  return groups;
}

function pct(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

/** Sentiment shares are taken over all reviews of the product, labelled or not. */
export function analyzeSentimentByProduct(
  reviews: readonly ReviewRow[],
  products: readonly ProductRow[] = []
): ProductSentiment[] {
  const names = new Map(products.map((product) => [product.product_id, product.product_name]));
  const rows: ProductSentiment[] = [];
  for (const [productId, productReviews] of groupBy(reviews, (review) => review.product_id)) {
    const counts = tally(productReviews);
    rows.push({
      product_id: productId,
      product_name: names.get(productId) ?? null,
      total_reviews: counts.reviews,
      positive_count: counts.positive,
      negative_count: counts.negative,
      neutral_count: counts.neutral,
      positive_pct: pct(counts.positive, counts.reviews),
      negative_pct: pct(counts.negative, counts.reviews),
      avg_rating: counts.ratings.length ? mean(counts.ratings) : null,
      rating_volatility: counts.ratings.length >= 2 ? sampleStd(counts.ratings) : null,
    });
  }
  return rows.sort((a, b) => a.product_id.localeCompare(b.product_id));
}

/** Monthly shares are taken over the reviews that carry a sentiment label. */
export function analyzeSentimentTrends(reviews: readonly ReviewRow[]): MonthlySentiment[] {
  const rows: MonthlySentiment[] = [];
  for (const [month, monthReviews] of groupBy(reviews, (review) => toMonthKey(review.date))) {
    const counts = tally(monthReviews);
    const labelled = counts.positive + counts.negative + counts.neutral;
    rows.push({
      month,
      reviews: counts.reviews,
      avg_rating: counts.ratings.length ? mean(counts.ratings) : null,
      positive_pct: pct(counts.positive, labelled),
      negative_pct: pct(counts.negative, labelled),
      neutral_pct: pct(counts.neutral, labelled),
    });
  }
  return rows.sort((a, b) => a.month.localeCompare(b.month));
}

export function ratingTrend(monthly: readonly MonthlySentiment[]): number | null {
  const ratings: number[] = [];
  for (const row of monthly) {
    if (row.avg_rating !== null) ratings.push(row.avg_rating);
  }
  return ratings.length >= 2 ? linearSlope(ratings) : null;
}

export function analyzeSentiment(
  reviews: readonly ReviewRow[],
  products: readonly ProductRow[] = []
): SentimentResult {
  if (!reviews.length) {
    return {
      byProduct: [],
      monthlyTrends: [],
      ratingTrend: null,
      warnings: ["No reviews available for sentiment analysis."],
    };
  }
  const monthlyTrends = analyzeSentimentTrends(reviews);
  return {
    byProduct: analyzeSentimentByProduct(reviews, products),
    monthlyTrends,
    ratingTrend: ratingTrend(monthlyTrends),
    warnings: [],
  };
}
