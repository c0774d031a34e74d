import { keyInYN, prompt } from "readline-sync";
import { IO } from "./IO";

export class Terminal implements IO {
  print(string: string): void {
    process.stdout.write(string);
  }
  warn(string: string): void {
    process.stderr.write(string);
  }
  readLine(): string | null {
    const line = prompt({ prompt: "" });
    if (line.toLowerCase() === "q") {
      if (keyInYN("Would you like to quit?")) {
        return null;
      }
    }
    return line;
  }
}
