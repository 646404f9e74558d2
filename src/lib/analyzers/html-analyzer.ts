import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

type CheerioRoot = ReturnType<typeof cheerio.load>;

export interface HeadingEntry {
  level: number;
  text: string;
  length: number;
}

export interface HtmlFeatureMap {
  meta_analysis: {
    title: string;
    title_length: number;
    description: string;
    description_length: number;
    has_og_title: boolean;
    has_og_description: boolean;
    has_og_image: boolean;
    structured_data_count: number;
    charset: string | null;
  };
  heading_analysis: {
    heading_counts: Record<string, number>;
    total_headings: number;
    heading_order: HeadingEntry[];
    hierarchy_issues: string[];
    has_h1: boolean;
    h1_count: number;
    multiple_h1: boolean;
  };
  navigation_analysis: {
    nav_elements_count: number;
    menu_lists_count: number;
    has_breadcrumbs: boolean;
    total_links: number;
    duplicate_link_texts: number;
    link_density: number;
  };
  form_analysis: {
    form_count: number;
    input_count: number;
    label_count: number;
    unlabeled_inputs: string[];
    unlabeled_count: number;
    has_error_handling: boolean;
    required_fields: number;
  };
  accessibility_analysis: {
    total_images: number;
    images_without_alt: number;
    alt_text_coverage: number;
    aria_elements_count: number;
    landmark_roles_count: number;
    tabindex_elements: number;
  };
  content_analysis: {
    word_count: number;
    char_count: number;
    paragraph_count: number;
    list_count: number;
    table_count: number;
    tables_with_headers: number;
    avg_paragraph_length: number;
  };
  link_analysis: {
    total_links: number;
    external_links: number;
    internal_links: number;
    mailto_links: number;
    tel_links: number;
    vague_link_texts: number;
    external_ratio: number;
  };
}

const BREADCRUMB_SELECTORS = [
  '[class*="breadcrumb"]',
  '[id*="breadcrumb"]',
  'nav ol',
  '[role="navigation"] ol',
];

const UNLABELED_EXEMPT_TYPES = ['hidden', 'submit', 'button'];
const LANDMARK_ROLE_PATTERN = /main|navigation|banner|complementary|contentinfo/;
const VAGUE_LINK_TEXTS = ['here', 'click here', 'click', 'more', 'read more', 'learn more'];

export function extractHtmlFeatures(html: string, url: string): HtmlFeatureMap {
  const $ = cheerio.load(html);

  return {
    meta_analysis: analyzeMeta($),
    heading_analysis: analyzeHeadings($),
    navigation_analysis: analyzeNavigation($),
    form_analysis: analyzeForms($),
    accessibility_analysis: analyzeAccessibility($),
    content_analysis: analyzeContent($),
    link_analysis: analyzeLinks($, url),
  };
}

function analyzeMeta($: CheerioRoot): HtmlFeatureMap['meta_analysis'] {
  const title = $('title').first().text().trim();
  const description = ($('meta[name="description"]').attr('content') || '').trim();

  return {
    title,
    title_length: title.length,
    description,
    description_length: description.length,
    has_og_title: $('meta[property="og:title"]').length > 0,
    has_og_description: $('meta[property="og:description"]').length > 0,
    has_og_image: $('meta[property="og:image"]').length > 0,
    structured_data_count: $('script[type="application/ld+json"]').length,
    charset: getCharset($),
  };
}

function getCharset($: CheerioRoot): string | null {
  const charset = $('meta[charset]').attr('charset');
  if (charset) return charset;

  const httpEquiv = $('meta[http-equiv]')
    .toArray()
    .find(el => /content-type/i.test($(el).attr('http-equiv') || ''));
  const match = httpEquiv ? ($(httpEquiv).attr('content') || '').match(/charset=([^;]+)/i) : null;
  return match ? match[1].trim() : null;
}

export function checkHeadingHierarchy(headings: HeadingEntry[]): string[] {
  const issues: string[] = [];
  if (headings.length === 0) return issues;

  if (headings[0].level !== 1) {
    issues.push('Headings do not start at H1');
  }
  for (let i = 1; i < headings.length; i++) {
    const prev = headings[i - 1].level;
    const curr = headings[i].level;
    if (curr > prev + 1) {
      issues.push(`Heading level jumps from H${prev} to H${curr}`);
    }
  }
  return issues;
}

function analyzeHeadings($: CheerioRoot): HtmlFeatureMap['heading_analysis'] {
  const counts: Record<string, number> = {};
  for (let level = 1; level <= 6; level++) {
    counts[`h${level}`] = $(`h${level}`).length;
  }

  const order: HeadingEntry[] = [];
  $('h1, h2, h3, h4, h5, h6').each((_, el) => {
    const text = $(el).text().trim();
    order.push({ level: Number(el.tagName.slice(1)), text, length: text.length });
  });

  const h1Count = counts.h1;
  return {
    heading_counts: counts,
    total_headings: order.length,
    heading_order: order,
    hierarchy_issues: checkHeadingHierarchy(order),
    has_h1: h1Count > 0,
    h1_count: h1Count,
    multiple_h1: h1Count > 1,
  };
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function analyzeNavigation($: CheerioRoot): HtmlFeatureMap['navigation_analysis'] {
  const links = $('a[href]');
  const linkTexts = links.toArray().map(el => $(el).text().trim()).filter(Boolean);
  const menuLists = $('ul[class]').filter((_, el) => /nav|menu/i.test($(el).attr('class') || ''));

  return {
    nav_elements_count: $('nav').length,
    menu_lists_count: menuLists.length,
    has_breadcrumbs: $(BREADCRUMB_SELECTORS.join(', ')).length > 0,
    total_links: links.length,
    duplicate_link_texts: linkTexts.length - new Set(linkTexts).size,
    link_density: links.length / Math.max(countWords($.root().text()), 1),
  };
}

function analyzeForms($: CheerioRoot): HtmlFeatureMap['form_analysis'] {
  const inputs = $('input');
  const unlabeled: string[] = [];

  inputs.each((_, el) => {
    const input = $(el);
    const type = (input.attr('type') || 'text').toLowerCase();
    if (UNLABELED_EXEMPT_TYPES.includes(type)) return;

    const id = input.attr('id');
    const hasLabel =
      (id !== undefined && id !== '' && $('label').filter((_, label) => $(label).attr('for') === id).length > 0) ||
      Boolean(input.attr('aria-label')) ||
      Boolean(input.attr('placeholder'));

    if (!hasLabel) unlabeled.push(input.attr('name') || 'unnamed');
  });

  const errorElements = $('[class]').filter((_, el) => /error/i.test($(el).attr('class') || ''));

  return {
    form_count: $('form').length,
    input_count: inputs.length,
    label_count: $('label').length,
    unlabeled_inputs: unlabeled,
    unlabeled_count: unlabeled.length,
    has_error_handling: errorElements.length > 0,
    required_fields: $('[required]').length,
  };
}

function analyzeAccessibility($: CheerioRoot): HtmlFeatureMap['accessibility_analysis'] {
  const images = $('img');
  const withoutAlt = images.filter((_, el) => !$(el).attr('alt')).length;
  const ariaElements = $<Element, '*'>('*').filter((_, el) => Object.keys(el.attribs).some(name => name.startsWith('aria-')));
  const landmarks = $('[role]').filter((_, el) => LANDMARK_ROLE_PATTERN.test($(el).attr('role') || ''));

  return {
    total_images: images.length,
    images_without_alt: withoutAlt,
    alt_text_coverage: (images.length - withoutAlt) / Math.max(images.length, 1),
    aria_elements_count: ariaElements.length,
    landmark_roles_count: landmarks.length,
    tabindex_elements: $('[tabindex]').length,
  };
}

function analyzeContent($: CheerioRoot): HtmlFeatureMap['content_analysis'] {
  const text = $.root().text();
  const paragraphs = $('p');
  const paragraphChars = paragraphs.toArray().reduce((sum, el) => sum + $(el).text().length, 0);
  const tables = $('table');

  return {
    word_count: countWords(text),
    char_count: text.replace(/[ \n]/g, '').length,
    paragraph_count: paragraphs.length,
    list_count: $('ul, ol').length,
    table_count: tables.length,
    tables_with_headers: tables.filter((_, el) => $(el).find('th').length > 0).length,
    avg_paragraph_length: paragraphChars / Math.max(paragraphs.length, 1),
  };
}

function analyzeLinks($: CheerioRoot, baseUrl: string): HtmlFeatureMap['link_analysis'] {
  let baseHost = '';
  try {
    baseHost = new URL(baseUrl).host;
  } catch {
    // Relative or malformed base: every http(s) link counts as external.
  }

  let external = 0;
  let internal = 0;
  let mailto = 0;
  let tel = 0;
  let vague = 0;

  const links = $('a[href]');
  links.each((_, el) => {
    const href = $(el).attr('href') || '';
    if (href.startsWith('mailto:')) {
      mailto++;
    } else if (href.startsWith('tel:')) {
      tel++;
    } else if (href.startsWith('http')) {
      let host = '';
      try { host = new URL(href).host; } catch { /* counted as external */ }
      if (host !== '' && host === baseHost) internal++;
      else external++;
    } else {
      internal++;
    }

    if (VAGUE_LINK_TEXTS.includes($(el).text().trim().toLowerCase())) vague++;
  });

  return {
    total_links: links.length,
    external_links: external,
    internal_links: internal,
    mailto_links: mailto,
    tel_links: tel,
    vague_link_texts: vague,
    external_ratio: external / Math.max(links.length, 1),
  };
}
