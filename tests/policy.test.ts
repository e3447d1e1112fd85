import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_POLICY, assert_policy, load_policy, read_policy_file } from '../src/policy.js';

describe('load_policy', () => {
  it('should return the defaults without overrides', () => {
    expect(load_policy()).toEqual(DEFAULT_POLICY);
  });

  it('should merge nested overrides over the defaults', () => {
    const policy = load_policy({ session: { max_questions: 20 }, repetition: { keyword_script: 'Cyrillic' } });
    expect(policy.session).toEqual({ max_minutes: 25, max_questions: 20, critical_red_flags: 8 });
    expect(policy.repetition.keyword_script).toBe('Cyrillic');
    expect(policy.time).toEqual(DEFAULT_POLICY.time);
  });

  it('should not mutate the defaults', () => {
    load_policy({ session: { max_minutes: 40 } });
    expect(DEFAULT_POLICY.session.max_minutes).toBe(25);
  });

  it('should reject non-numeric thresholds', () => {
    expect(() => load_policy({ time: { critical_minutes: 'three' } }))
      .toThrow('time.critical_minutes: expected a finite number');
  });

  it('should reject unknown keys', () => {
    expect(() => load_policy({ session: { max_hours: 1 } })).toThrow('session.max_hours: unknown key');
  });

  it('should reject unordered thresholds', () => {
    expect(() => load_policy({ time: { wrap_up_minutes: 2 } }))
      .toThrow('time: expected critical_minutes < wrap_up_minutes < acceleration_minutes');
    expect(() => load_policy({ report: { hire: 90 } }))
      .toThrow('report: expected conditional_hire <= hire <= strong_hire');
  });

  it('should reject an unknown keyword script', () => {
    expect(() => load_policy({ repetition: { keyword_script: 'Klingon' } }))
      .toThrow('repetition.keyword_script: unknown Unicode script "Klingon"');
  });
});

describe('assert_policy', () => {
  it('should list every missing key', () => {
    const { session: _session, ...partial } = DEFAULT_POLICY;
    expect(() => assert_policy({ ...partial, plan: { max_areas: 4 } }))
      .toThrow('Invalid interview policy:\n- session: missing\n- plan.max_concerns: missing');
  });

  it('should accept the defaults', () => {
    expect(() => assert_policy(DEFAULT_POLICY)).not.toThrow();
  });
});

describe('read_policy_file', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('should load overrides from a JSON file', () => {
    dir = mkdtempSync(join(tmpdir(), 'policy-'));
    const path = join(dir, 'policy.json');
    writeFileSync(path, JSON.stringify({ session: { max_minutes: 45 } }));

    expect(read_policy_file(path).session.max_minutes).toBe(45);
  });

  it('should wrap read failures with the path', () => {
    dir = mkdtempSync(join(tmpdir(), 'policy-'));
    const path = join(dir, 'missing.json');
    expect(() => read_policy_file(path)).toThrow(`Cannot read interview policy from ${path}`);
  });
});
