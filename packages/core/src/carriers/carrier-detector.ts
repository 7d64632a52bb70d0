import { DEFAULT_CARRIER_RULES, type CarrierRule } from './carrier-table.js';

export interface DetectedCarrier {
  /** Carrier name, or null when no rule matched */
  carrier: string | null;
  /** Provider carrier code; 0 lets the provider auto-detect */
  carrierCode: number;
}

/**
 * CarrierDetector
 * Classifies a tracking number by the first matching rule of an ordered table.
 */
export class CarrierDetector {
  private readonly rules: readonly CarrierRule[];

  constructor(rules: readonly CarrierRule[] = DEFAULT_CARRIER_RULES) {
    this.rules = rules;
  }

  detect(trackingNumber: string): DetectedCarrier {
    const tn = trackingNumber.trim();
    for (const rule of this.rules) {
      if (rule.pattern.test(tn)) {
        return { carrier: rule.name, carrierCode: rule.code };
      }
    }
    return { carrier: null, carrierCode: 0 };
  }
}
