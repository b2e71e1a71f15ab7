import type { PiiEntity } from "@triage/shared";

/** Independent OCR pass over the same media. Returns the recognised text. */
export interface OcrEngine {
  readonly id: string;
  recognize(input: { contentRef: string; signal: AbortSignal }): Promise<string>;
}

/** Re-transcribes a window of the audio behind `contentRef`. */
export interface TranscriptionEngine {
  readonly id: string;
  transcribe(input: {
    contentRef: string;
    startSeconds: number;
    endSeconds: number;
    signal: AbortSignal;
  }): Promise<string>;
}

export interface PiiDetector {
  readonly id: string;
  detect(input: { text: string; signal: AbortSignal }): Promise<PiiEntity[]>;
}

/** Secondary engines available for cross-validation. A null engine is treated as unavailable. */
export type SecondaryEngines = {
  ocr: OcrEngine | null;
  transcription: TranscriptionEngine | null;
  pii: PiiDetector[];
};

// Earlier patterns claim their spans first, so a card number is never also reported as a phone number.
const PATTERNS: Array<{ entityType: string; regex: RegExp; accept?: (match: string) => boolean }> = [
  { entityType: "EMAIL_ADDRESS", regex: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g },
  { entityType: "CREDIT_CARD", regex: /\b(?:\d[ -]?){12,18}\d\b/g, accept: luhnValid },
  {
    entityType: "IP_ADDRESS",
    regex: /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/g,
  },
  {
    entityType: "PHONE_NUMBER",
    regex: /(?<![\w+(])\+?\(?\d[\d\s().-]{5,}\d(?!\w)/g,
    accept: (m) => {
      const digits = m.replace(/\D/g, "").length;
      return digits >= 7 && digits <= 15;
    },
  },
];

function luhnValid(candidate: string) {
  const digits = candidate.replace(/\D/g, "");
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let d = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 1) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
  }
  return sum % 10 === 0;
}

/** Scans `text` with the built-in patterns. Spans are sorted by start offset. */
export function detectPatterns(text: string): PiiEntity[] {
  const found: PiiEntity[] = [];
  const overlaps = (start: number, end: number) => found.some((e) => start < e.span.end && e.span.start < end);

  for (const { entityType, regex, accept } of PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (accept && !accept(match[0])) continue;
      if (overlaps(start, end)) continue;
      found.push({ entityType, span: { start, end }, text: match[0] });
    }
  }

  return found.sort((a, b) => a.span.start - b.span.start);
}

/** Deterministic detector, independent of any statistical NER model. */
export class PatternPiiDetector implements PiiDetector {
  readonly id: string;

  constructor(id = "pattern-matcher") {
    this.id = id;
  }

  async detect(input: { text: string; signal: AbortSignal }) {
    input.signal.throwIfAborted();
    return detectPatterns(input.text);
  }
}
