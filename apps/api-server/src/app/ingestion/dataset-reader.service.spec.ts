import * as fs from 'fs';
import * as path from 'path';
import { createTestWorkspace, TestWorkspace } from '../../testing/test-config';
import { writeWorkbook } from '../../testing/workbook';
import { DatasetReaderService } from './dataset-reader.service';
import { DatasetReadError } from './ingestion.errors';

describe('DatasetReaderService', () => {
  const reader = new DatasetReaderService();
  let workspace: TestWorkspace;

  beforeEach(() => {
    workspace = createTestWorkspace();
  });

  afterEach(() => workspace.cleanup());

  it('reads the header and rows of the first sheet', () => {
    const ref = writeWorkbook(workspace.dir, 'batch.xlsx', [
      [' Stock_Symbol ', 'Company_Name', 'current_ratio'],
      ['AAA', 'Alpha', 1.5],
      ['BBB', 'Beta', null],
    ]);

    const dataset = reader.read(ref);

    expect(dataset.columns).toEqual(['Stock_Symbol', 'Company_Name', 'current_ratio']);
    expect(dataset.rows).toEqual([
      ['AAA', 'Alpha', 1.5],
      ['BBB', 'Beta', null],
    ]);
  });

  it('reads csv files', () => {
    const filePath = path.join(workspace.dir, 'batch.csv');
    fs.writeFileSync(filePath, 'stock_symbol,company_name,sector\nAAA,Alpha,Energy\n');

    const dataset = reader.read({ path: filePath, fileName: 'batch.csv' });

    expect(dataset.columns).toEqual(['stock_symbol', 'company_name', 'sector']);
    expect(dataset.rows).toEqual([['AAA', 'Alpha', 'Energy']]);
  });

  it('returns no rows for a header-only sheet', () => {
    const ref = writeWorkbook(workspace.dir, 'empty.xlsx', [['stock_symbol', 'company_name']]);

    expect(reader.read(ref).rows).toEqual([]);
  });

  it('fails with a read error when the file is missing', () => {
    const ref = { path: path.join(workspace.dir, 'gone.xlsx'), fileName: 'gone.xlsx' };

    expect(() => reader.read(ref)).toThrow(DatasetReadError);
  });
});
