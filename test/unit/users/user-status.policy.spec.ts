import { describe, it, expect } from 'vitest';
import {
  describeStatus,
  isValidStatus,
  statusLabel,
} from '../../../src/modules/users/policies/user-status.policy';
import { isValidEmail } from '../../../src/modules/users/policies/email-format.policy';
import { categorizeByDaysActive } from '../../../src/modules/users/policies/age-category.policy';

describe('isValidStatus', () => {
  it('treats active, inactive and pending as valid', () => {
    expect(isValidStatus('active')).toBe(true);
    expect(isValidStatus('inactive')).toBe(true);
    expect(isValidStatus('pending')).toBe(true);
  });

  it('treats suspended as NOT valid even though it is a status', () => {
    expect(isValidStatus('suspended')).toBe(false);
  });
});

describe('statusLabel', () => {
  it('capitalises the token', () => {
    expect(statusLabel('active')).toBe('Active');
    expect(statusLabel('suspended')).toBe('Suspended');
  });
});

describe('describeStatus', () => {
  it('builds the per-status sentence', () => {
    expect(describeStatus('Bob', 'inactive')).toBe('Bob is not active');
    expect(describeStatus('Bob', 'suspended')).toBe('Bob has been suspended');
  });
});

describe('isValidEmail', () => {
  it('requires both "@" and "." anywhere in the string', () => {
    expect(isValidEmail('john@example.com')).toBe(true);
    expect(isValidEmail('a@b.')).toBe(true);
    expect(isValidEmail('.@')).toBe(true);
    expect(isValidEmail('john@example')).toBe(false);
    expect(isValidEmail('john.example.com')).toBe(false);
  });
});

describe('categorizeByDaysActive', () => {
  it('uses inclusive upper bounds', () => {
    expect(categorizeByDaysActive(30)).toBe('New');
    expect(categorizeByDaysActive(31)).toBe('Regular');
    expect(categorizeByDaysActive(365)).toBe('Regular');
    expect(categorizeByDaysActive(366)).toBe('Veteran');
    expect(categorizeByDaysActive(-1)).toBe('Veteran');
  });
});
