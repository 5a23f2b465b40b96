import { describe, expect, test } from 'vitest';
import { emptyHints } from '../testing/fakes.js';
import { extract, extractFromHints, mergeEntities } from './entityExtractor.js';

describe('extract', () => {
  test('pulls the link and the payment handle out of a bank-block lure', () => {
    const text =
      'Your account will be blocked, verify at http://fake-bank.example/verify and pay to scammer@upi';

    expect(extract(text)).toEqual([
      { kind: 'payment_handle', value: 'scammer@upi' },
      { kind: 'url', value: 'fake-bank.example/verify' },
    ]);
  });

  test('is idempotent over the same text', () => {
    const text = 'call 9876543210 or pay me@upi';
    const once = extract(text);

    expect(once).toEqual([
      { kind: 'payment_handle', value: 'me@upi' },
      { kind: 'phone_number', value: '9876543210' },
    ]);
    expect(extract(text)).toEqual(once);
    expect(mergeEntities(once, extract(text))).toEqual(once);
  });

  test('normalizes phone numbers to digits, keeping the country code', () => {
    expect(extract('WhatsApp me on +91 98765-43210')).toEqual([
      { kind: 'phone_number', value: '919876543210' },
    ]);
    expect(extract('landline (022) 2345 6789 ok')).toEqual([
      { kind: 'phone_number', value: '02223456789' },
    ]);
  });

  test('does not join a trailing count or time onto a phone number', () => {
    expect(extract('Call 9876543210 24/7 for help')).toEqual([{ kind: 'phone_number', value: '9876543210' }]);
    expect(extract('Call 9876543210 10 minutes left')).toEqual([{ kind: 'phone_number', value: '9876543210' }]);
    expect(extract('Helpline +91 9876543210 24 hours')).toEqual([
      { kind: 'phone_number', value: '919876543210' },
    ]);
  });

  test('splits two numbers written one after the other', () => {
    expect(extract('+91 9876543210 9123456789')).toEqual([
      { kind: 'phone_number', value: '9123456789' },
      { kind: 'phone_number', value: '919876543210' },
    ]);
  });

  test('ignores digit runs that are not phone-shaped', () => {
    expect(extract('ref 12345678 dated 2026-01-15, account 123456789012')).toEqual([]);
  });

  test('lower-cases handles and URL hosts but not URL paths', () => {
    expect(extract('Pay Refund.Desk@PAYTM now, then open https://Pay-Now.ONLINE/Claim.')).toEqual([
      { kind: 'payment_handle', value: 'refund.desk@paytm' },
      { kind: 'url', value: 'pay-now.online/Claim' },
    ]);
  });

  test('drops a bare trailing slash', () => {
    expect(extract('see http://Example.COM/')).toEqual([{ kind: 'url', value: 'example.com' }]);
  });

  test('accepts bare domains only when they look like phishing', () => {
    expect(extract('open www.Secure-Login.xyz/kyc now or bit.ly/abc123')).toEqual([
      { kind: 'url', value: 'bit.ly/abc123' },
      { kind: 'url', value: 'www.secure-login.xyz/kyc' },
    ]);
    expect(extract('see notes.txt and report.final')).toEqual([]);
  });

  test('does not read a missing space after a full stop as a domain', () => {
    expect(extract('Your account is blocked.Click here')).toEqual([]);
    expect(extract('Your account is blocked.click here')).toEqual([]);
    expect(extract('Verify at secure-pay.click/kyc today')).toEqual([{ kind: 'url', value: 'secure-pay.click/kyc' }]);
  });

  test('does not read e-mail addresses as payment handles', () => {
    expect(extract('write to john.doe@gmail.com')).toEqual([]);
  });

  test('keeps a handle that runs into the next sentence', () => {
    expect(extract('Pay to scammer@paytm.Send now')).toEqual([{ kind: 'payment_handle', value: 'scammer@paytm' }]);
  });

  test('does not read digits inside a link as a phone number', () => {
    expect(extract('track at https://x.example/track/9876543210')).toEqual([
      { kind: 'url', value: 'x.example/track/9876543210' },
    ]);
  });

  test('returns nothing for empty text', () => {
    expect(extract('')).toEqual([]);
  });
});

describe('mergeEntities', () => {
  test('never drops what was already known', () => {
    const first = extract('pay me@upi');
    const merged = mergeEntities(first, extract('call 9876543210'));

    expect(merged).toEqual([
      { kind: 'payment_handle', value: 'me@upi' },
      { kind: 'phone_number', value: '9876543210' },
    ]);
    expect(mergeEntities(merged, [])).toEqual(merged);
  });
});

describe('extractFromHints', () => {
  test('admits only hints that pass extraction', () => {
    const hints = {
      ...emptyHints(),
      paymentHandles: ['Fraud@PAYTM'],
      phoneNumbers: ['98765 43210', '12'],
      urls: ['fake-bank.example/login'],
    };

    expect(extractFromHints(hints)).toEqual([
      { kind: 'payment_handle', value: 'fraud@paytm' },
      { kind: 'phone_number', value: '9876543210' },
      { kind: 'url', value: 'fake-bank.example/login' },
    ]);
  });
});
