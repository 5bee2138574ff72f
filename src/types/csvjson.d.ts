// csvjson ships no type declarations and has no @types package.
declare module 'csvjson' {
  namespace csvjson {
    interface ParseOptions {
      delimiter?: string;
    }

    interface CsvOptions {
      delimiter?: string;
      wrap?: boolean;
      headers?: 'full' | 'none' | 'relative' | 'key';
    }

    function toColumnArray(data: string, options?: ParseOptions): Record<string, string[]>;
    function toCSV(data: object[], options?: CsvOptions): string;
  }

  export = csvjson;
}
