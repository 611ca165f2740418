import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatResult } from '../../../src/cli/output-formatter.js';
import { failure, misuse, success } from '../../../src/cli/types/cli-result.js';

describe('formatResult', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('prints nothing for a bare success', () => {
    expect(formatResult(success())).toBe('');
  });

  it('lists details under the message', () => {
    const text = formatResult(success({ message: 'Live piers: 2', details: ['~nec', '~zod'] }));

    expect(text).toBe('✅ Live piers: 2\n\n  • ~nec\n  • ~zod');
  });

  it('marks failures and appends suggestions', () => {
    const text = formatResult(
      failure('Failed to load ~zod', { details: ['PIER_NOT_FOUND: No pier "zod" in the live zone'], suggestions: ['Run "harbormaster list"'] })
    );

    expect(text).toBe(
      '❌ Failed to load ~zod\n\n  • PIER_NOT_FOUND: No pier "zod" in the live zone\n\n💡 Suggestions:\n  • Run "harbormaster list"'
    );
  });

  it('prints a misuse message alone when there is nothing to suggest', () => {
    expect(formatResult(misuse('Not a ship name: "Zod"'))).toBe('❌ Not a ship name: "Zod"');
  });
});
