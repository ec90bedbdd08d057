import { readFile } from 'fs/promises';

export interface ContractRow {
  address: string;
  /** Deployment transaction, needed to read creation code over RPC. */
  txHash?: string;
}

function detectDelimiter(header: string): string {
  if (header.includes(',')) return ',';
  if (header.includes(';')) return ';';
  if (header.includes('\t')) return '\t';
  return ',';
}

/**
 * Split CSV text into records. Quoted fields may contain the delimiter, line
 * breaks and doubled quotes (`""`).
 */
export function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  const endField = () => {
    record.push(field.trim());
    field = '';
  };
  const endRecord = () => {
    endField();
    if (record.some(cell => cell !== '')) records.push(record);
    record = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"' && field.trim() === '') {
      field = '';
      quoted = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\n') {
      endRecord();
    } else if (ch !== '\r') {
      field += ch;
    }
  }
  if (field !== '' || record.length > 0) endRecord();

  return records;
}

/**
 * Parse a contracts CSV. Column names are matched case-insensitively; rows
 * without an address (or without a tx_hash when one is required) are skipped.
 */
export function parseContractsCsv(text: string, { requireTxHash = false } = {}): ContractRow[] {
  const content = text.replace(/^\uFEFF/, '');
  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
  const [header, ...body] = parseRecords(content, detectDelimiter(firstLine));
  if (header === undefined) return [];

  const columns = header.map(name => name.toLowerCase());
  const addressCol = columns.indexOf('address');
  const txHashCol = columns.indexOf('tx_hash');

  if (addressCol === -1) {
    throw new Error(`CSV has no "address" column. Columns: ${columns.join(', ')}`);
  }
  if (requireTxHash && txHashCol === -1) {
    throw new Error(`CSV has no "tx_hash" column. Columns: ${columns.join(', ')}`);
  }

  const rows: ContractRow[] = [];
  for (const row of body) {
    const address = row[addressCol] ?? '';
    const txHash = txHashCol === -1 ? '' : row[txHashCol] ?? '';
    if (!address) continue;
    if (requireTxHash && !txHash) continue;
    rows.push(txHash ? { address, txHash } : { address });
  }
  return rows;
}

export async function readContractsCsv(path: string, options?: { requireTxHash?: boolean }): Promise<ContractRow[]> {
  return parseContractsCsv(await readFile(path, 'utf8'), options);
}
