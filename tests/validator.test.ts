import { describe, it, expect } from 'vitest';
import { validateDecision, validateProfile, validateTimelines } from '../src/engine/validator';
import { ValidationError } from '../src/errors';

const baseProfile = { user_id: 'u1', age: 30, current_role: 'Eng' };

describe('validateProfile', () => {
  it.each([16, 30, 100])('accepts age %i', age => {
    expect(validateProfile({ ...baseProfile, age }).age).toBe(age);
  });

  it.each([15, 101, 30.5, '30'])('rejects age %s', age => {
    expect(() => validateProfile({ ...baseProfile, age })).toThrow('Age must be an integer between 16 and 100');
  });

  it('names the first missing required field', () => {
    expect(() => validateProfile({ age: 25, current_role: 'Engineer' })).toThrow('Missing required field: userId');
    expect(() => validateProfile({ user_id: 'u1', age: 25 })).toThrow('Missing required field: currentRole');
    expect(() => validateProfile({ user_id: 'u1', current_role: 'Eng' })).toThrow('Missing required field: age');
  });

  it('throws ValidationError', () => {
    expect(() => validateProfile({})).toThrow(ValidationError);
  });

  it('maps snake_case keys and fills absent lists without touching the input', () => {
    const input: Record<string, unknown> = { ...baseProfile, life_goals: ['lead a team'] };
    const profile = validateProfile(input);

    expect(profile.userId).toBe('u1');
    expect(profile.currentRole).toBe('Eng');
    expect(profile.lifeGoals).toEqual(['lead a team']);
    expect(profile.skills).toEqual([]);
    expect(profile.interests).toEqual([]);
    expect(profile.pastDecisions).toEqual([]);
    expect('skills' in input).toBe(false);
  });

  it('accepts camelCase keys and keeps extra fields', () => {
    const profile = validateProfile({ userId: 'u2', age: 40, currentRole: 'Designer', location: 'Lisbon' });
    expect(profile.userId).toBe('u2');
    expect(profile.location).toBe('Lisbon');
  });

  it('rejects list fields that are not lists', () => {
    expect(() => validateProfile({ ...baseProfile, skills: 'TypeScript' })).toThrow('skills must be a list');
  });

  it('rejects a blank identifier', () => {
    expect(() => validateProfile({ ...baseProfile, user_id: '   ' })).toThrow('userId must be a non-empty string');
  });

  it('rejects non-object profiles', () => {
    expect(() => validateProfile('not a dict')).toThrow('Profile must be an object');
    expect(() => validateProfile(['u1'])).toThrow('Profile must be an object');
  });
});

describe('validateDecision', () => {
  it('returns the trimmed text', () => {
    expect(validateDecision('  Should I change my career path to focus on AI?  ')).toBe(
      'Should I change my career path to focus on AI?'
    );
  });

  it('accepts exactly 10 characters after trimming and rejects 9', () => {
    expect(validateDecision('  abcdefghij  ')).toBe('abcdefghij');
    expect(() => validateDecision(' abcdefghi ')).toThrow('Decision must be at least 10 characters long');
  });

  it('rejects short decisions', () => {
    expect(() => validateDecision('Yes?')).toThrow('Decision must be at least 10 characters long');
  });

  it.each(['', null, undefined, 123])('rejects %s as empty or non-text', value => {
    expect(() => validateDecision(value)).toThrow('Decision must be a non-empty string');
  });
});

describe('validateTimelines', () => {
  it('returns valid timelines in order', () => {
    expect(validateTimelines(['5yr', '1yr', '3yr'])).toEqual(['5yr', '1yr', '3yr']);
  });

  it('names the invalid entry', () => {
    expect(() => validateTimelines(['1yr', '10yr'])).toThrow('Invalid timeline: 10yr. Must be one of 1yr, 3yr, 5yr');
  });

  it.each([[[]], ['not a list'], [undefined]])('rejects %s', value => {
    expect(() => validateTimelines(value)).toThrow('Timelines must be a non-empty list');
  });
});
