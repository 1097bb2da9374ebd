import { describe, it, expect } from '@jest/globals';
import { formatModelTable } from './models.js';

describe('formatModelTable', () => {
  it('aligns the columns', () => {
    expect(
      formatModelTable([
        { name: 'm', contextWindow: 4096, countingStrategy: 'exact', kind: 'chat' },
        { name: 'image-model', contextWindow: 1000, countingStrategy: 'characters', kind: 'image' },
      ])
    ).toEqual([
      'Model' + ' '.repeat(6) + '  ' + '   Window' + '  ' + 'Counting  ' + '  Kind',
      'm' + ' '.repeat(10) + '  ' + '     4096' + '  ' + 'exact     ' + '  chat',
      'image-model' + '  ' + '     1000' + '  ' + 'characters' + '  image',
    ]);
  });
});
