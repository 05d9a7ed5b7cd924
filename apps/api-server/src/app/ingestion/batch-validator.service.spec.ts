import { BatchValidatorService } from './batch-validator.service';
import { SchemaError } from './ingestion.errors';

describe('BatchValidatorService', () => {
  const validator = new BatchValidatorService();

  it('matches headers case-insensitively and keys rows by column', () => {
    const dataset = validator.validate({
      columns: ['Stock_Symbol', 'COMPANY_NAME', 'Current_Ratio', 'Notes'],
      rows: [
        ['AAA', 'Alpha', 1.4, 'first'],
        ['BBB', 'Beta', null, 'second'],
      ],
    });

    expect(dataset.columns).toEqual(['stock_symbol', 'company_name', 'current_ratio']);
    expect(dataset.ignoredColumns).toEqual(['notes']);
    expect(dataset.rows).toEqual([
      { stock_symbol: 'AAA', company_name: 'Alpha', current_ratio: 1.4 },
      { stock_symbol: 'BBB', company_name: 'Beta', current_ratio: null },
    ]);
  });

  it('rejects a dataset without the entity key column', () => {
    const raw = { columns: ['company_name', 'current_ratio'], rows: [['Alpha', 1.2]] };

    expect(() => validator.validate(raw)).toThrow(SchemaError);
    try {
      validator.validate(raw);
    } catch (err) {
      expect(err instanceof SchemaError && err.missingColumns).toEqual(['stock_symbol']);
    }
  });

  it('reports every missing column, sorted, with the same message on each run', () => {
    const raw = { columns: [], rows: [] };
    const messages: string[] = [];

    for (let i = 0; i < 2; i++) {
      try {
        validator.validate(raw);
      } catch (err) {
        messages.push(err instanceof Error ? err.message : '');
      }
    }

    expect(messages).toEqual([
      'Dataset is missing required columns: company_name, stock_symbol. Required columns are: stock_symbol, company_name.',
      'Dataset is missing required columns: company_name, stock_symbol. Required columns are: stock_symbol, company_name.',
    ]);
  });

  it('accepts a header with no data rows', () => {
    const dataset = validator.validate({ columns: ['stock_symbol', 'company_name'], rows: [] });

    expect(dataset.rows).toEqual([]);
  });

  it('keeps the first of two columns that differ only in case', () => {
    const dataset = validator.validate({
      columns: ['stock_symbol', 'company_name', 'Sector', 'SECTOR'],
      rows: [['AAA', 'Alpha', 'Energy', 'Utilities']],
    });

    expect(dataset.rows[0].sector).toBe('Energy');
  });
});
