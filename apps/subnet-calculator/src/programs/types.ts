import type { CalculatorConfig } from "../config";

export type TTYPrograms = {
    help: TTYProgram;
} & Record<string, TTYProgram>;

export enum TTYProgramStatus {
    OK,
    ERROR,
}

export type TTYProgramAbout = {
    description: string;
    content: string;
};

export type TTYProgram = TTYProgramMetaData & TTYProgramInitializer;

/** `argv` holds the arguments after the program name */
export type TTYProgramInitializer = (writer: TTYWriter, config: CalculatorConfig, programs: TTYPrograms) => {
    run(argv: string[]): Promise<TTYProgramStatus>;
};

export type TTYProgramMetaData = {
    about: TTYProgramAbout;
};

export type TTYWriter = {
    write(text: string): void;
    clear(): void;
};
