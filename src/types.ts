export const NOT_AVAILABLE = 'N/A';

export type SalaryType = 'per annum' | 'per hour' | typeof NOT_AVAILABLE;

export type WorkArrangement = 'Hybrid' | 'Remote' | 'Flexible' | 'Onsite' | typeof NOT_AVAILABLE;

export type ParseFlag =
  | 'invalid_url'
  | 'missing_salary'
  | 'missing_benefits'
  | 'no_attachments'
  | 'missing_key_criteria'
  | 'scraping_error_band'
  | 'invalid_num_positions';

export interface JobRecord {
  title: string;
  council: string;
  detail_url: string;
  closing_date: string;
  closing_time: string;
  location: string;
  employment_type: string;
  work_arrangement: WorkArrangement;
  salary: string;
  salary_type: SalaryType;
  band_level: string;
  description: string;
  requirements: string[];
  key_criteria: string[];
  application_instructions: string;
  contact_info: string;
  reference_number: string;
  department: string;
  job_category: string;
  benefits: string;
  attachments: string[];
  num_positions: number;
  eeo_statement: string;
  posted_date: string;
  scraped_at: string;
  parse_flags: ParseFlag[];
}

export interface RawCandidate {
  linkId?: string;
  title?: string;
  closingDate?: string;
  compensation?: string;
  location?: string;
  department?: string;
  employmentType?: string;
  workArrangement?: string;
  jobRef?: string;
  detailHref?: string;
  domHref?: string;
  slug?: string;
}

export interface TenancySelectors {
  appRoot: string;
  row: string;
  rowTitle: string;
  detailLink: string;
  description: string[];
  headings: string;
  attachments: string;
}

export interface Tenancy {
  name: string;
  listingUrl: string;
  minCardRows: number;
  loadHook: string;
  selectors: TenancySelectors;
}

export interface ScrapeSettings {
  maxJobs: number;
  scrollIterations: number;
  scrollDelayMs: number;
  interJobDelayMs: number;
  interCouncilDelayMs: number;
  rssLookbackDays: number;
  headless: boolean;
  listingScreenshotPath?: string;
  userAgent: string;
  timeouts: {
    listingNavigationMs: number;
    loadStateMs: number;
    rowsMs: number;
    detailNavigationMs: number;
    clickMs: number;
  };
}
