import { describe, it, expect } from 'vitest';
import { buildSubject, ActivitySubjects } from '../subjects.js';

describe('subjects', () => {
  it('should prefix subjects with the namespace', () => {
    expect(buildSubject('bots', 'a', 'b')).toBe('idlestop.bots.a.b');
  });

  it('should build activity and status subjects', () => {
    expect(ActivitySubjects.activity('default')).toBe('idlestop.default.activity');
    expect(ActivitySubjects.status('default')).toBe('idlestop.default.status');
  });
});
