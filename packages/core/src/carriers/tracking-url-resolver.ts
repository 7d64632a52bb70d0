import { CarrierDetector } from './carrier-detector.js';
import {
  DEFAULT_TRACKING_URL_TEMPLATES,
  FALLBACK_TRACKING_URL_TEMPLATE,
} from './carrier-table.js';

export interface TrackingUrlResolverOptions {
  detector?: CarrierDetector;
  templates?: Readonly<Record<string, string>>;
  fallbackTemplate?: string;
}

/**
 * TrackingUrlResolver
 * Builds a followable tracking page URL. Never fails: an unknown carrier
 * falls back to the universal 17TRACK page.
 */
export class TrackingUrlResolver {
  private readonly detector: CarrierDetector;
  private readonly templates: ReadonlyMap<string, string>;
  private readonly fallbackTemplate: string;

  constructor(opts: TrackingUrlResolverOptions = {}) {
    this.detector = opts.detector ?? new CarrierDetector();
    this.fallbackTemplate = opts.fallbackTemplate ?? FALLBACK_TRACKING_URL_TEMPLATE;
    const templates = opts.templates ?? DEFAULT_TRACKING_URL_TEMPLATES;
    // keyed by lowercase carrier name for case-insensitive lookup
    this.templates = new Map(
      Object.entries(templates).map(([name, template]) => [name.toLowerCase(), template])
    );
  }

  resolve(trackingNumber: string, carrier?: string | null): string {
    const tn = trackingNumber.trim();

    if (carrier) {
      const template = this.templates.get(carrier.toLowerCase());
      if (template) return fill(template, tn);
    }

    const detected = this.detector.detect(tn).carrier;
    if (detected) {
      const template = this.templates.get(detected.toLowerCase());
      if (template) return fill(template, tn);
    }

    return fill(this.fallbackTemplate, tn);
  }
}

function fill(template: string, trackingNumber: string): string {
  return template.split('{tn}').join(trackingNumber);
}
