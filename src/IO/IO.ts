export interface IO {
  /** Next line of input, or null once the user is done. */
  readLine(): string | null;
  print(string: string): void;
  warn(string: string): void;
}
