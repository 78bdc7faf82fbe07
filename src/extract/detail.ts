import type { DetailPage } from '../browser/types.js';
import {
  extractApplicationInstructions,
  extractBandLevel,
  extractBenefitsFromText,
  extractContactInfo,
  extractEeo,
  extractNumPositions,
  extractPostedDate,
} from '../normalize/fields.js';
import { NOT_AVAILABLE } from '../types.js';
import type { TenancySelectors } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { looksLikePdf, uniqueInOrder } from '../utils/text.js';
import { toAbsoluteUrl } from '../utils/url.js';
import { firstSuccess, orDefault } from './strategies.js';

export const MAX_DESCRIPTION_LENGTH = 5000;
export const MAX_REQUIREMENTS = 10;
export const MAX_KEY_CRITERIA = 5;

const EXPAND_PATTERNS = [/view more/i, /show more/i, /see more/i, /read more/i, /expand/i];
const DESCRIPTION_KEYWORDS = /(duties|overview|about the role)/i;

export const REQUIREMENT_KEYWORDS = ['requirements', 'skills', 'responsibilities', 'experience'];
export const KEY_CRITERIA_KEYWORDS = ['key selection criteria'];
export const BENEFIT_KEYWORDS = ['benefits', 'perks', 'what we offer'];

function joinParts(parts: string[]): string {
  return parts
    .map((part) => part.trim())
    .filter(Boolean)
    .join(' ')
    .trim();
}

/**
 * Clicks "view more"/"read more" style toggles so lazily rendered sections
 * are in the DOM before any text is read.
 */
export async function expandCollapsibleSections(page: DetailPage, logger?: Logger): Promise<void> {
  for (const pattern of EXPAND_PATTERNS) {
    for (const role of ['button', 'link'] as const) {
      try {
        const clicked = await page.clickAll(role, pattern);
        if (clicked > 0) {
          logger?.debug(`Expanded ${clicked} ${role}(s) matching ${pattern.source}`);
        }
      } catch (error) {
        logger?.debug(`Expanding ${role}s matching ${pattern.source} failed: ${String(error)}`);
      }
    }
  }
}

export async function readBodyText(page: DetailPage, logger?: Logger): Promise<string> {
  return orDefault(() => page.bodyText(), '', 'Reading body text', logger);
}

export async function extractDescription(page: DetailPage, selectors: string[], logger?: Logger): Promise<string> {
  const description = await firstSuccess(
    [
      {
        name: 'description selectors',
        run: async () => {
          const parts: string[] = [];
          for (const selector of selectors) {
            parts.push(...(await orDefault(() => page.textsOf(selector), [], `Description selector ${selector}`, logger)));
          }
          return joinParts(parts);
        },
      },
      {
        name: 'description keywords',
        run: async () => (await page.firstTextMatching(DESCRIPTION_KEYWORDS)) ?? '',
      },
      {
        name: 'body text',
        run: async () => joinParts([await page.bodyText()]),
      },
    ],
    '',
    logger,
  );
  return description ? description.slice(0, MAX_DESCRIPTION_LENGTH) : NOT_AVAILABLE;
}

export async function extractSectionBullets(
  page: DetailPage,
  headingSelector: string,
  keywords: string[],
  logger?: Logger,
): Promise<string[]> {
  const items = await orDefault(
    () => page.listItemsUnderHeadings(headingSelector, keywords),
    [],
    `Section bullets for ${keywords.join('/')}`,
    logger,
  );
  return items.map((item) => item.trim()).filter(Boolean);
}

export async function extractAttachments(page: DetailPage, selector: string, logger?: Logger): Promise<string[]> {
  const hrefs = await orDefault(() => page.hrefsOf(selector), [], 'Attachment links', logger);
  const base = page.url();
  return uniqueInOrder(
    hrefs
      .map((href) => href.trim())
      .filter(Boolean)
      .map((href) => toAbsoluteUrl(href, base))
      .filter((href) => looksLikePdf(href)),
  );
}

export async function extractBenefits(
  page: DetailPage,
  headingSelector: string,
  bodyText: string,
  logger?: Logger,
): Promise<string> {
  const bullets = await extractSectionBullets(page, headingSelector, BENEFIT_KEYWORDS, logger);
  if (bullets.length > 0) {
    return uniqueInOrder(bullets).join('; ');
  }
  return extractBenefitsFromText(bodyText);
}

export interface DetailFields {
  description: string;
  requirements: string[];
  keyCriteria: string[];
  applicationInstructions: string;
  contactInfo: string;
  bandLevel: string;
  benefits: string;
  attachments: string[];
  numPositions: number;
  eeoStatement: string;
  postedDate: string;
  bodyText: string;
}

export function emptyDetailFields(): DetailFields {
  return {
    description: NOT_AVAILABLE,
    requirements: [],
    keyCriteria: [],
    applicationInstructions: NOT_AVAILABLE,
    contactInfo: NOT_AVAILABLE,
    bandLevel: NOT_AVAILABLE,
    benefits: NOT_AVAILABLE,
    attachments: [],
    numPositions: 1,
    eeoStatement: NOT_AVAILABLE,
    postedDate: NOT_AVAILABLE,
    bodyText: '',
  };
}

/** Runs every detail-page extractor against an already loaded page. */
export async function extractDetailFields(
  page: DetailPage,
  selectors: TenancySelectors,
  logger?: Logger,
): Promise<DetailFields> {
  await expandCollapsibleSections(page, logger);

  const description = await extractDescription(page, selectors.description, logger);
  const requirements = await extractSectionBullets(page, selectors.headings, REQUIREMENT_KEYWORDS, logger);
  const keyCriteria = await extractSectionBullets(page, selectors.headings, KEY_CRITERIA_KEYWORDS, logger);
  const bodyText = await readBodyText(page, logger);

  return {
    description,
    requirements: requirements.slice(0, MAX_REQUIREMENTS),
    keyCriteria: keyCriteria.slice(0, MAX_KEY_CRITERIA),
    applicationInstructions: extractApplicationInstructions(bodyText),
    contactInfo: extractContactInfo(bodyText),
    bandLevel: extractBandLevel(bodyText),
    benefits: await extractBenefits(page, selectors.headings, bodyText, logger),
    attachments: await extractAttachments(page, selectors.attachments, logger),
    numPositions: extractNumPositions(bodyText),
    eeoStatement: extractEeo(bodyText),
    postedDate: extractPostedDate(bodyText, logger),
    bodyText,
  };
}
