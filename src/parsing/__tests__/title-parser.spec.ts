import { DEFAULT_ALLOWED_DOMAINS } from '../../settings/settings.js';
import { parseTaskIdentifier, parseTitle } from '../title-parser.js';

const KNOWN: ReadonlySet<string> = new Set(DEFAULT_ALLOWED_DOMAINS);

describe('parseTitle', () => {
  it('parses the primary grammar', () => {
    expect(parseTitle('alex-fund_finance-3-hard-1712345678', KNOWN)).toEqual({
      trainerName: 'alex',
      domain: 'fund_finance',
      interfaceNum: 3,
      complexity: 'hard',
      timestamp: '1712345678',
      grammar: 'primary',
    });
  });

  it('returns the same result on repeated calls', () => {
    const title = 'sam.lee-smart_home-12-expert-1700000000';
    expect(parseTitle(title, KNOWN)).toEqual(parseTitle(title, KNOWN));
    expect(parseTitle(title, KNOWN)?.trainerName).toBe('sam.lee');
  });

  it.each(DEFAULT_ALLOWED_DOMAINS.map((d) => [d]))(
    'resolves %s when its underscores are written as hyphens',
    (domain) => {
      const title = `sam-${domain.replace(/_/g, '-')}-1-medium-1712345678`;
      const parsed = parseTitle(title, KNOWN);
      expect(parsed?.domain).toBe(domain);
      expect(parsed?.trainerName).toBe('sam');
    },
  );

  it('keeps hyphenated trainer names together', () => {
    expect(parseTitle('mary-jane-finance-2-expert-1712345678', KNOWN)).toMatchObject({
      trainerName: 'mary-jane',
      domain: 'finance',
      interfaceNum: 2,
    });
    expect(parseTitle('mary-jane-fund-finance-2-expert-1712345678', KNOWN)).toMatchObject({
      trainerName: 'mary-jane',
      domain: 'fund_finance',
    });
  });

  it('borrows the trainer suffix when the domain is only a fragment', () => {
    expect(parseTitle('jo_hr-experts-4-hard-1712345678', KNOWN)).toMatchObject({
      trainerName: 'jo',
      domain: 'hr_experts',
    });
    expect(parseTitle('ann_incident-management-1-medium-1712345678', KNOWN)).toMatchObject({
      trainerName: 'ann',
      domain: 'incident_management',
    });
  });

  it('loses a trainer suffix that happens to be a domain prefix (known-lossy)', () => {
    // A trainer genuinely named "jo_hr" cannot be told apart from a split "hr_payroll".
    expect(parseTitle('jo_hr-payroll-5-medium-1712345678', KNOWN)).toMatchObject({
      trainerName: 'jo',
      domain: 'hr_payroll',
    });
  });

  it('keeps an unknown domain as captured, normalized', () => {
    expect(parseTitle('bob-Garden-Care-1-hard-1712345678', KNOWN)).toMatchObject({
      trainerName: 'bob',
      domain: 'garden_care',
    });
  });

  it('falls back for titles without interface and complexity', () => {
    expect(parseTitle('alex-finance-legacy-1712345678', KNOWN)).toEqual({
      trainerName: 'alex',
      domain: 'finance',
      interfaceNum: 0,
      complexity: 'unknown',
      timestamp: '1712345678',
      grammar: 'fallback',
    });
    expect(parseTitle('alex-finance-1712345678', KNOWN)).toMatchObject({
      domain: 'finance',
      interfaceNum: 0,
      grammar: 'fallback',
    });
  });

  it('rejects titles matching neither grammar', () => {
    expect(parseTitle('Update README', KNOWN)).toBeNull();
    expect(parseTitle('alex-finance-3-hard-123', KNOWN)).toBeNull();
    expect(parseTitle('', KNOWN)).toBeNull();
  });
});

describe('parseTaskIdentifier', () => {
  it('finds the task folder in an artifact path', () => {
    const parsed = parseTaskIdentifier(
      'week_14_fund_finance/alex_pod/alex-fund_finance-3-hard-1712345678/result.json',
      KNOWN,
    );
    expect(parsed).toMatchObject({
      trainerName: 'alex',
      domain: 'fund_finance',
      interfaceNum: 3,
      timestamp: '1712345678',
    });
  });

  it('parses a bare file name without its extension', () => {
    expect(parseTaskIdentifier('sam-finance-7-medium-1712345678.json', KNOWN)).toMatchObject({
      trainerName: 'sam',
      interfaceNum: 7,
    });
  });

  it('returns null when no segment parses', () => {
    expect(parseTaskIdentifier('docs/guide/README.md', KNOWN)).toBeNull();
  });
});
