import { Writable } from 'stream';

export type OutputFormat = 'plain' | 'json';

export interface OutputOptions {
  stream?: Writable;
  errorStream?: Writable;
  format?: OutputFormat;
}

export class OutputService {
  private stdout: Writable;
  private stderr: Writable;
  private format: OutputFormat;

  constructor(options?: OutputOptions) {
    this.stdout = options?.stream ?? process.stdout;
    this.stderr = options?.errorStream ?? process.stderr;
    this.format = options?.format ?? 'plain';
  }

  get outputFormat(): OutputFormat {
    return this.format;
  }

  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  writeLine(message: string = ''): void {
    this.stdout.write(message + '\n');
  }

  writeError(message: string): void {
    this.stderr.write(message + '\n');
  }

  /**
   * JSON-RPC payloads are always pretty-printed, whatever the format
   */
  writeJsonBlock(label: string, data: unknown): void {
    if (this.format === 'json') {
      this.writeLine(JSON.stringify({ [label]: data }, null, 2));
      return;
    }
    this.writeLine(`${label}:`);
    this.writeLine(JSON.stringify(data, null, 2));
  }

  writeJson(data: unknown): void {
    const output =
      this.format === 'json'
        ? JSON.stringify(data, null, 2)
        : this.formatPlainOutput(data);
    this.writeLine(output);
  }

  writeTable(headers: string[], rows: string[][]): void {
    if (this.format === 'json') {
      const data = rows.map((row) => {
        const obj: Record<string, string> = {};
        headers.forEach((header, index) => {
          obj[header] = row[index] ?? '';
        });
        return obj;
      });
      this.writeJson(data);
      return;
    }

    const columnWidths = headers.map((header, i) => {
      const rowLengths = rows.map((row) => row[i]?.length ?? 0);
      return Math.max(header.length, ...rowLengths);
    });

    const separator = columnWidths
      .map((width) => '-'.repeat(width + 2))
      .join('+');

    const formatRow = (cells: string[]): string =>
      '| ' +
      columnWidths
        .map((width, i) => (cells[i] ?? '').padEnd(width))
        .join(' | ') +
      ' |';

    this.writeLine(separator);
    this.writeLine(formatRow(headers));
    this.writeLine(separator);
    rows.forEach((row) => {
      this.writeLine(formatRow(row));
    });
    this.writeLine(separator);
  }

  writeSuccess(message: string): void {
    if (this.format === 'json') {
      this.writeJson({ status: 'success', message });
    } else {
      this.writeLine(`✓ ${message}`);
    }
  }

  writeWarning(message: string): void {
    if (this.format === 'json') {
      this.writeJson({ status: 'warning', message });
    } else {
      this.writeLine(`⚠ ${message}`);
    }
  }

  writeErrorMessage(message: string): void {
    if (this.format === 'json') {
      this.writeJson({ status: 'error', message });
    } else {
      this.writeError(`✗ ${message}`);
    }
  }

  private formatPlainOutput(data: unknown): string {
    if (typeof data === 'string') {
      return data;
    }
    if (data === null || data === undefined) {
      return '';
    }
    if (Array.isArray(data)) {
      return data.map((item) => this.formatPlainOutput(item)).join('\n');
    }
    if (typeof data === 'object') {
      return Object.entries(data)
        .map(([key, value]) => `${key}: ${this.formatPlainOutput(value)}`)
        .join('\n');
    }
    if (
      typeof data === 'number' ||
      typeof data === 'boolean' ||
      typeof data === 'bigint'
    ) {
      return String(data);
    }
    if (typeof data === 'symbol') {
      return data.toString();
    }
    return '[Function]';
  }
}

export const output = new OutputService();
