import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as XLSX from 'xlsx';
import { DatasetRef } from '@riskline/shared-models';
import { describeError } from '../common/errors';
import { RawDataset } from './dataset-schema';
import { DatasetReadError } from './ingestion.errors';

/**
 * Reads the first sheet of a staged spreadsheet (xlsx, xls or csv).
 */
@Injectable()
export class DatasetReaderService {
  private readonly logger = new Logger(DatasetReaderService.name);

  read(ref: DatasetRef): RawDataset {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(fs.readFileSync(ref.path), { type: 'buffer' });
    } catch (err) {
      throw new DatasetReadError(ref.fileName, describeError(err), err);
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
      throw new DatasetReadError(ref.fileName, 'workbook contains no sheets');
    }

    const [header = [], ...rows] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      blankrows: false,
      raw: true,
    });

    const columns = header.map((h) => (h === null || h === undefined ? '' : String(h).trim()));

    this.logger.log(
      `Read "${ref.fileName}" (sheet "${sheetName}"): [${columns.join(', ')}] | Data rows: ${rows.length}`
    );

    return { columns, rows };
  }
}
