/**
 * Amount resolution
 *
 * Reads an untrusted amount (number or text such as "₹1,200.50", "Rs. 300",
 * "(45.00)") into positive minor units plus the sign it carried.
 */

import { parseDecimalToMinor } from '../ledger/money.js';
import type { AmountResolution, RejectionReason } from './normalization-types.js';

// A dot right after a letter ends an abbreviation ("Rs.300"), it is not a decimal point
const NUMBER_BODY = /(?:(?<!\p{L})\.)?\d(?:[\d.,'_\s]*\d)?/u;
const GROUPING = /[,'_\s]/gu;
const MINUS = /[-−]/u;
const ACCOUNTING_NEGATIVE = /^\((.*)\)$/su;

export function resolveAmount(raw: unknown): AmountResolution {
  if (typeof raw === 'number') {
    return fromNumber(raw);
  }
  if (typeof raw === 'string') {
    return fromText(raw);
  }
  return invalid('Amount is missing');
}

function fromNumber(value: number): AmountResolution {
  if (!Number.isFinite(value)) {
    return invalid(`Amount is not a finite number: ${value}`);
  }
  const absolute = Math.abs(value);
  // Shortest round-trip form; exponent forms only occur below 1e-6 or from 1e21 up
  const text = String(absolute);
  const digits = /e/i.test(text) ? absolute.toFixed(20) : text;
  return fromDecimal(digits, value < 0, String(value));
}

function fromText(raw: string): AmountResolution {
  let text = raw.normalize('NFKC').trim();
  let negative = false;

  const accounting = ACCOUNTING_NEGATIVE.exec(text);
  if (accounting) {
    negative = true;
    text = (accounting[1] ?? '').trim();
  }

  const body = NUMBER_BODY.exec(text);
  if (!body) {
    return invalid(`Amount has no digits: "${raw}"`);
  }

  const prefix = text.slice(0, body.index);
  const suffix = text.slice(body.index + body[0].length);
  if (/\d/.test(suffix)) {
    return invalid(`Amount is ambiguous: "${raw}"`);
  }
  if (MINUS.test(prefix)) {
    negative = true;
  }

  let digits = body[0].replace(GROUPING, '');
  if (digits.startsWith('.')) {
    digits = `0${digits}`;
  }

  return fromDecimal(digits, negative, raw);
}

function fromDecimal(digits: string, negative: boolean, raw: string): AmountResolution {
  const amountMinor = parseDecimalToMinor(digits);
  if (amountMinor === null) {
    return invalid(`Amount is not a decimal number: "${raw}"`);
  }
  if (amountMinor === 0) {
    return {
      ok: false,
      reason: { code: 'ZeroAmount', message: 'Amount is zero; nothing to record' },
    };
  }
  return { ok: true, amountMinor, negative };
}

function invalid(message: string): { ok: false; reason: RejectionReason } {
  return { ok: false, reason: { code: 'InvalidAmount', message } };
}
