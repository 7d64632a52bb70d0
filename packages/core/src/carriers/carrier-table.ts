/**
 * Carrier pattern and tracking-page tables
 *
 * Rule order is precedence: several numbering schemes overlap, so the
 * country-suffixed UPU formats come first and the bare numeric FedEx/DHL
 * formats last.
 */

export interface CarrierRule {
  /** Carrier display name */
  readonly name: string;
  /** 17TRACK carrier code sent on registration */
  readonly code: number;
  readonly pattern: RegExp;
}

export const DEFAULT_CARRIER_RULES: readonly CarrierRule[] = Object.freeze([
  { name: "CTT Portugal", code: 2151, pattern: /^[A-Z]{2}\d{9}PT$/i },
  { name: "China Post", code: 3011, pattern: /^[A-Z]{2}\d{9}CN$/i },
  { name: "Royal Mail", code: 1051, pattern: /^[A-Z]{2}\d{9}GB$/i },
  { name: "La Poste", code: 1031, pattern: /^[A-Z]{2}\d{9}FR$/i },
  { name: "Deutsche Post", code: 1011, pattern: /^[A-Z]{2}\d{9}DE$/i },
  { name: "USPS", code: 100001, pattern: /^(92|93|94)\d{18,22}$/ },
  { name: "PostNL", code: 1071, pattern: /^3S[A-Z0-9]{13,15}$/i },
  { name: "UPS", code: 100002, pattern: /^1Z[A-Z0-9]{16}$/i },
  { name: "FedEx", code: 100003, pattern: /^\d{12}(\d{3})?(\d{5})?(\d{7})?$/ },
  { name: "DHL", code: 100001, pattern: /^\d{10,11}$/ },
]);

/**
 * Carrier tracking pages; `{tn}` is replaced by the tracking number
 */
export const DEFAULT_TRACKING_URL_TEMPLATES: Readonly<Record<string, string>> = Object.freeze({
  "FedEx": "https://www.fedex.com/fedextrack/?trknbr={tn}",
  "UPS": "https://www.ups.com/track?tracknum={tn}",
  "DHL": "https://www.dhl.com/en/express/tracking.html?AWB={tn}",
  "CTT Portugal": "https://www.ctt.pt/feapl_2/app/open/objectSearch/objectSearch.jspx?objects={tn}",
  "USPS": "https://tools.usps.com/go/TrackConfirmAction?tLabels={tn}",
  "Royal Mail": "https://www.royalmail.com/track-your-item#/tracking-results/{tn}",
  "La Poste": "https://www.laposte.fr/outils/suivre-vos-envois?code={tn}",
  "Deutsche Post": "https://www.deutschepost.de/de/s/sendungsverfolgung.html?piececode={tn}",
  "PostNL": "https://jouw.postnl.nl/track-and-trace/{tn}",
  "China Post": "https://t.17track.net/en#nums={tn}",
});

/** Universal multi-carrier page used when no carrier template applies */
export const FALLBACK_TRACKING_URL_TEMPLATE = "https://t.17track.net/en#nums={tn}";
