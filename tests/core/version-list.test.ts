import { describe, expect, it } from 'vitest';

import type { Installation } from '../../src/core/discovery.js';
import { formatVersionList } from '../../src/core/version-list.js';

const installations: Installation[] = [
  { name: '17', path: '/opt/java/17' },
  { name: '21', path: '/opt/java/21' },
  { name: '8', path: '/opt/java/8' }
];

describe('formatVersionList', () => {
  it('numbers entries from 1 and marks the default', () => {
    expect(formatVersionList(installations, '21')).toEqual(['1. 17', '2. 21 (default)', '3. 8']);
  });

  it('marks nothing without a default', () => {
    expect(formatVersionList(installations)).toEqual(['1. 17', '2. 21', '3. 8']);
  });

  it('marks nothing when the default is not installed', () => {
    expect(formatVersionList(installations, '11')).toEqual(['1. 17', '2. 21', '3. 8']);
  });
});
