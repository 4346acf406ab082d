import type { RunFailure } from './errors';
import type { MonetizationAnalysis, PricingAnalysis, VisionAnalysis } from './extract/schemas';

export type CompetitorProfile = Readonly<{
  id: string;
  name: string;
  rootUrl: string;
  manualOverrides: readonly string[];
  /** ISO 3166 alpha-2 code of the target market, or null for no regional focus. */
  country: string | null;
}>;

export type PageCategory = 'pricing' | 'features' | 'blog' | 'careers' | 'unknown';
export type DiscoveryMethod = 'sitemap' | 'link-pattern' | 'manual-override';
export type ConfidenceLevel = 'maximum' | 'high' | 'medium';

export const CONFIDENCE_SCORE: Record<ConfidenceLevel, number> = {
  maximum: 1,
  high: 0.9,
  medium: 0.6,
};

export type DiscoveredPage = {
  url: string;
  category: PageCategory;
  method: DiscoveryMethod;
  confidence: ConfidenceLevel;
  score: number;
};

export type RawDocument = Readonly<{
  url: string;
  fetchedAt: string;
  content: string;
  contentHash: string;
  contentType: string;
  status: number;
}>;

export type DocumentRef = {
  url: string;
  contentHash: string;
  fetchedAt: string;
};

export type SourceType = 'social' | 'review-site' | 'forum';

export type ComplaintSource = {
  url: string;
  platform: string;
  sourceType: SourceType;
  documentHash: string;
  seenAt: string;
};

export type Complaint = {
  id: string;
  text: string;
  sourceType: SourceType;
  sourceUrl: string;
  firstSeen: string;
  sources: ComplaintSource[];
};

export const COMPLAINT_CATEGORIES = ['Product Gaps', 'Service & Support', 'Billing & Contract', 'Performance'] as const;
export type ComplaintCategory = (typeof COMPLAINT_CATEGORIES)[number];
export type AssignedCategory = ComplaintCategory | 'Uncategorized';

export type Severity = 'Low' | 'Medium' | 'High' | 'Critical';

export type CategorizedComplaint = Complaint & {
  category: AssignedCategory;
  categoryConfidence: number;
  needsReview: boolean;
  severity: Severity | null;
  summary: string | null;
};

export type CategorizedComplaints = {
  items: CategorizedComplaint[];
  counts: Record<AssignedCategory, number>;
  reviewQueue: number;
};

export type AnalysisType = 'pricing' | 'monetization' | 'vision';

export type SectionStatus = 'ok' | 'low_confidence' | 'missing';

export type SectionResult<T> = {
  status: SectionStatus;
  confidence: number;
  data: T | null;
};

export type DiscoveryStatus = 'complete' | 'incomplete';

export type AnalysisResult = {
  competitorId: string;
  competitor: { name: string; rootUrl: string; country: string | null };
  status: 'Complete' | 'PartiallyComplete';
  generatedAt: string;
  discoveryStatus: DiscoveryStatus;
  pages: DiscoveredPage[];
  documents: DocumentRef[];
  pricing: SectionResult<PricingAnalysis>;
  monetization: SectionResult<MonetizationAnalysis>;
  vision: SectionResult<VisionAnalysis>;
  complaints: SectionResult<CategorizedComplaints>;
  overallConfidence: number;
  failures: RunFailure[];
};

export function toDocumentRef(doc: RawDocument): DocumentRef {
  return { url: doc.url, contentHash: doc.contentHash, fetchedAt: doc.fetchedAt };
}
