import { describe, expect, it } from 'vitest';

import { responseCodeFromText } from '../../src/remote/codes.js';

describe('responseCodeFromText', () => {
  it.each([
    ['ok', 'success'],
    ['ok-save', 'success'],
    ['ok-script-greeting', 'success'],
    ['ok-updated_license', 'updated_license'],
    ['error-license_key_not_found', 'license_key_not_found'],
    ['error-license_key_locked', 'license_key_locked'],
    ['error-license_key_owing_balance', 'license_key_owing_balance'],
    ['error-script', 'remote_script_error'],
  ])('maps %s to %s', (text, code) => {
    expect(responseCodeFromText(text)).toBe(code);
  });

  it('maps anything else to unknown', () => {
    expect(responseCodeFromText('maybe')).toBe('unknown');
    expect(responseCodeFromText('constructor')).toBe('unknown');
  });
});
