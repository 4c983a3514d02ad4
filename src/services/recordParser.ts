import { Origin, TextSource, UNKNOWN_SOURCE, sourceToString } from '../models/origin';
import { UnitRecord } from '../models/record';
import { RecordSyntaxError } from './errors';

// `key: value` where key is a single token; whitespace before the colon is allowed.
const KEY_VALUE = /^([^\s:]+)\s*:(.*)$/;
const PERIODS = /^\.+$/;

/**
 * Parse text in the record grammar into records, in input order.
 *
 *  - blank lines separate records (runs of blank lines never make empty records)
 *  - `key: value` starts a field; a repeated key within one record is an error
 *  - a line starting with a space continues the last field; a continuation
 *    consisting only of N periods stands for N-1 periods (so `.` is an empty line)
 *  - lines starting with `#` are comments
 *
 * Parsing stops at the first error; nothing parsed before it is returned.
 */
export function parseRecords(text: string, source: TextSource = UNKNOWN_SOURCE): UnitRecord[] {
  const where = sourceToString(source);
  const records: UnitRecord[] = [];
  let data: Map<string, string> | null = null;
  let offsets = new Map<string, number>();
  let startLine = 0;
  let endLine = 0;
  let key: string | undefined;
  let values: string[] = [];

  const commitKey = () => {
    if(key !== undefined && data){
      data.set(key, values.join('\n'));
    }
    key = undefined;
    values = [];
  };
  const commitRecord = () => {
    commitKey();
    if(data && data.size){
      records.push(Object.freeze({ data, origin: new Origin(source, startLine, endLine), fieldOffsets: offsets }));
    }
    data = null;
    offsets = new Map();
  };

  const lines = text.split('\n');
  for(let i = 0; i < lines.length; i++){
    const lineno = i + 1;
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    if(line.startsWith('#')) continue;
    if(!line.trim()){
      commitRecord();
      continue;
    }
    if(line.startsWith(' ')){
      if(key === undefined) throw new RecordSyntaxError(where, lineno, 'Unexpected multi-line value');
      let value = line.slice(1);
      const bare = value.trim();
      if(PERIODS.test(bare)) value = bare.slice(1);
      values.push(value);
      endLine = lineno;
      continue;
    }
    const m = KEY_VALUE.exec(line);
    if(!m) throw new RecordSyntaxError(where, lineno, 'Unexpected non-empty line');
    commitKey();
    if(!data){
      data = new Map();
      startLine = lineno;
    }
    const newKey = m[1];
    const newValue = m[2].trim();
    const old = data.get(newKey);
    if(old !== undefined){
      throw new RecordSyntaxError(where, lineno, `Job has a duplicate key '${newKey}' with old value '${old}' and new value '${newValue}'`);
    }
    key = newKey;
    values = newValue ? [newValue] : [];
    offsets.set(newKey, lineno - startLine);
    endLine = lineno;
  }
  commitRecord();
  return records;
}

function escapeContinuation(line: string): string {
  if(!line) return '.';
  if(PERIODS.test(line)) return '.' + line;
  return line;
}

function isReadonlyMap(data: ReadonlyMap<string, string> | Record<string, string>): data is ReadonlyMap<string, string> {
  return data instanceof Map;
}

/** Serialize one record; the output always ends with the blank separator line. */
export function dumpRecord(data: ReadonlyMap<string, string> | Record<string, string>): string {
  const entries = isReadonlyMap(data) ? Array.from(data.entries()) : Object.entries(data);
  const out: string[] = [];
  for(const [k, v] of entries){
    // padded values go on a continuation line, the `key: value` form trims them
    const padded = v !== v.trim() && v.trim() !== '';
    if(v.includes('\n') || padded){
      out.push(`${k}:`);
      for(const line of v.split('\n')) out.push(' ' + escapeContinuation(line));
    } else {
      out.push(v ? `${k}: ${v}` : `${k}:`);
    }
  }
  return out.join('\n') + '\n\n';
}

export function dumpRecords(records: Iterable<UnitRecord>): string {
  let out = '';
  for(const r of records) out += dumpRecord(r.data);
  return out;
}
