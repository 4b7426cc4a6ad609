import {
  intro as clackIntro,
  outro as clackOutro,
  note as clackNote,
} from "@clack/prompts";

export type OutputStream = {
  write(chunk: string): unknown;
};

export type CliUi = {
  intro(message: string): void;
  outro(message: string): void;
  note(message: string, title: string): void;
  print(text: string): void;
  printError(text: string): void;
};

export type CreateClackUiOptions = {
  stdout?: OutputStream;
  stderr?: OutputStream;
};

export function createClackUi(options: CreateClackUiOptions = {}): CliUi {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  function intro(message: string): void {
    clackIntro(message);
  }

  function outro(message: string): void {
    clackOutro(message);
  }

  function note(message: string, title: string): void {
    clackNote(message, title);
  }

  function print(text: string): void {
    writeText(stdout, text);
  }

  function printError(text: string): void {
    writeText(stderr, text);
  }

  return {
    intro,
    outro,
    note,
    print,
    printError,
  };
}

function writeText(stream: OutputStream, text: string): void {
  stream.write(text);
  if (!text.endsWith("\n")) {
    stream.write("\n");
  }
}
