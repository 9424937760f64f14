/**
 * Job posting shapes shared by the dedupe store, checkpoints and detail fetches.
 */

export interface JobPosting {
  title: string;
  company: string;
  location: string;
  source: string;
  link?: string;
  /** Listing identifier supplied by the board, when the collector has one */
  externalId?: string;
  salary?: string;
  jobType?: string;
  description?: string;
  collectedAt: string;
  [key: string]: unknown;
}

/**
 * Optional fields recovered from a listing's detail page. Every field may be
 * absent even when the fetch itself succeeded.
 */
export interface JobDetail {
  salary?: string;
  jobType?: string;
  companyRating?: number;
  companyReviewCount?: number;
  companyRecommendPct?: number;
  description?: string;
  datePosted?: string;
}

export interface DedupeRecord {
  hash: string;
  link: string | null;
  title: string;
  company: string;
  location: string;
  source: string;
  collectedAt: string;
}

export interface Checkpoint<T = JobPosting> {
  timestamp: string;
  totalCollected: number;
  totalWithSalary: number;
  currentQuery: string | null;
  items: T[];
}
