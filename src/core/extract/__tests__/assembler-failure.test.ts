import { describe, it, expect, jest } from '@jest/globals';
import { ErrorManager } from '../../error-manager.js';
import { extractFacility } from '../assembler.js';

jest.mock('../fields.js', () => {
  const actual = jest.requireActual<typeof import('../fields.js')>('../fields.js');
  return {
    ...actual,
    extractRating: () => {
      throw new Error('unexpected markup');
    },
  };
});

describe('RecordAssembler with a throwing extractor', () => {
  it('turns the throw into a field error and still fills the other fields', () => {
    const warn = jest.fn();
    const errors = new ErrorManager({
      logger: { log: jest.fn(), warn, error: jest.fn() },
    });

    const record = extractFacility(
      '<h1 class="MuiTypography-root MuiTypography-h1 css-qinhw0">Poda</h1>',
      'https://www.example.com/s/poda',
      errors
    );

    expect(record.name).toBe('Poda');
    expect(record.rating).toBeUndefined();
    expect(errors.getFieldErrors()).toEqual([
      {
        kind: 'field',
        fieldName: 'rating',
        locator: 'https://www.example.com/s/poda',
        message: 'unexpected markup',
      },
    ]);
    expect(warn).toHaveBeenCalledWith(
      "Error accessing element 'rating' on 'https://www.example.com/s/poda': unexpected markup"
    );
  });
});
