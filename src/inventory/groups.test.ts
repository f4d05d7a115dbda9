import { describe, it, expect } from '@jest/globals';
import { GroupMap } from './groups.js';

describe('GroupMap', () => {
  it('should create a group on first append and keep insertion order', () => {
    const groups = new GroupMap();
    groups.append('prod', 'b');
    groups.append('dev', 'x');
    groups.append('prod', 'a');

    expect(Array.from(groups.entries())).toEqual([
      ['prod', ['b', 'a']],
      ['dev', ['x']],
    ]);
    expect(groups.size).toBe(2);
  });

  it('should keep duplicate members', () => {
    const groups = new GroupMap();
    groups.append('prod', 'a');
    groups.append('prod', 'a');

    expect(Array.from(groups.entries())).toEqual([['prod', ['a', 'a']]]);
  });

  it('should start empty', () => {
    const groups = new GroupMap();

    expect(groups.size).toBe(0);
    expect(Array.from(groups.entries())).toEqual([]);
  });
});
