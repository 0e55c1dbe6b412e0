export interface LogLine {
  lineNumber: number;
  text: string;
}

export interface ILogReader {
  exists(filePath: string): Promise<boolean>;
  lines(filePath: string): AsyncIterable<LogLine>;
}
