export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export type YesNo = 'Yes' | 'No';

export type DiversityLevel = 'High' | 'Medium' | 'Low' | 'Unknown';

export type ProviderType = 'Center' | 'Family' | 'Unknown';

export interface ExtractedRecord {
  AgesServed: string;
  Mandarin: YesNo;
  MealsProvided: YesNo;
  Curriculum: string;
  CulturalDiversity: DiversityLevel;
  StaffStability: YesNo;
}

export type FetchMethod = 'static' | 'rendered' | 'failed';

export type PageRole = 'homepage' | 'subpage' | 'source';

export type PageContent = {
  url: string;
  text: string;
  method: FetchMethod;
  length: number;
  role: PageRole;
};

export type AggregatedContent = {
  mode: 'site' | 'url-list';
  baseUrl?: string;
  urls?: string[];
  pages: PageContent[];
  combinedText: string;
  scrapedUrls: string[];
  failedUrls: string[];
};

export type ExtractionMode = 'single-page' | 'multi-page' | 'multi-source';

export type ProviderCandidate = {
  name: string;
  address: string;
  phone: string;
  rating: number | null;
  websites: string[];
  distance: number | null;
};

export type CacheMetadata = {
  scraping_method?: ExtractionMode;
  pages_scraped?: number;
  total_urls_provided?: number;
  scraped_urls?: string[];
  failed_urls?: string[];
  total_text_length?: number;
  cached_at?: string;
};

export type CacheEntry = ExtractedRecord & CacheMetadata;

export const CRITERIA = [
  'Mandarin',
  'Meals',
  'Curriculum',
  'Staff Stability',
  'Cultural Diversity',
  'MSFT Discount',
] as const;

export type Criterion = (typeof CRITERIA)[number];

export type WeightConfig = Record<Criterion, number>;

export type ScoredProvider = {
  Rank: number;
  Name: string;
  Address: string;
  Phone: string;
  Rating: number | null;
  Website: string;
  Distance: number | null;
  Type: ProviderType;
  MSFTDiscount: YesNo;
  AgesServed: string;
  Mandarin: YesNo;
  MealsProvided: YesNo;
  Curriculum: string;
  CulturalDiversity: DiversityLevel;
  StaffStability: YesNo;
  Score: number;
  Status: string;
};
