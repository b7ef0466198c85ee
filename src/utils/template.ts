import { ImageVariant, PageTemplates } from '../types';

export const PLACEHOLDER = '%d';

export interface VariantSpec {
  suffix: string;
  /** Bounding box edge in pixels; null keeps the raw rasterization size. */
  maxDimension: number | null;
}

export const VARIANTS: Record<ImageVariant, VariantSpec> = {
  small: { suffix: '-small', maxDimension: 300 },
  normal: { suffix: '', maxDimension: 800 },
  large: { suffix: '-large', maxDimension: null }
};

// normal, small, large: the order pages are uploaded in
export const UPLOAD_ORDER: readonly ImageVariant[] = ['normal', 'small', 'large'];

/**
 * Templates carry exactly one placeholder; a second `%d` is left as text.
 */
export function hasSinglePlaceholder(template: string): boolean {
  return template.split(PLACEHOLDER).length === 2;
}

/**
 * Insert a suffix right after the placeholder: `page%d.jpg` -> `page%d-small.jpg`.
 */
export function withSuffix(template: string, suffix: string): string {
  return template.replace(PLACEHOLDER, PLACEHOLDER + suffix);
}

export function resolvePage(template: string, page: number): string {
  return template.replace(PLACEHOLDER, String(page));
}

/**
 * Derive the three local templates of a job from its base (normal) template.
 */
export function deriveTemplates(baseTemplate: string): PageTemplates {
  return {
    jpegTemplate: baseTemplate,
    smallTemplate: withSuffix(baseTemplate, VARIANTS.small.suffix),
    largeTemplate: withSuffix(baseTemplate, VARIANTS.large.suffix)
  };
}

export function templateFor(templates: PageTemplates, variant: ImageVariant): string {
  switch (variant) {
    case 'small':
      return templates.smallTemplate;
    case 'large':
      return templates.largeTemplate;
    default:
      return templates.jpegTemplate;
  }
}
