import { createInterface, type Interface } from "node:readline";
import type { CalculatorConfig } from "./config";
import { runTTYProgram, type TTYPrograms, TTYProgramStatus, type TTYWriter } from "./programs/program";
import { args_parse, args_parse_ext } from "./utils/args-parse";

enum ShellState {
    UNITIALIZED,
    PROMPT,
    RUNNING_PROGRAM,
}

export type ShellOptions = {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    programs: TTYPrograms;
    config: CalculatorConfig;
    /** enables line editing and tab completion */
    terminal?: boolean;
    prompt?: string;
};

const EXIT_COMMAND = "exit";

/**
 * Completes the program name, or the argument of `help`.
 * Follows the readline completer contract: matches and the word they replace.
 */
export function completeProgramName(programs: TTYPrograms, line: string): [string[], string] {
    let { args, active } = args_parse_ext(line);

    // the cursor sits after a space, a new word is being started
    let word = active < 0 ? "" : args[active];
    let position = active < 0 ? args.length : active;

    let completesName = position == 0 || (position == 1 && args[0] == "help");
    if (!completesName) {
        return [[], word];
    }

    let names = Object.keys(programs);
    if (position == 0) names.push(EXIT_COMMAND);

    return [names.filter(name => name.startsWith(word)), word];
}

export default class Shell {
    private state: ShellState = ShellState.UNITIALIZED;
    private closed = false;
    private readline: Interface;
    private writer: TTYWriter;

    constructor(private options: ShellOptions) {
        let { input, output, programs, terminal = false, prompt = "subnet> " } = options;

        this.readline = createInterface({
            input,
            output,
            terminal,
            prompt,
            completer: (line: string) => completeProgramName(programs, line),
        });
        this.readline.on("close", () => { this.closed = true; });

        this.writer = {
            write: (text) => { output.write(text); },
            clear: () => { output.write("\x1b[2J\x1b[H"); },
        };
    }

    /** reads lines until `exit` or the end of input, resolves with the status of the last program */
    async run(): Promise<TTYProgramStatus> {
        if (this.state != ShellState.UNITIALIZED) {
            throw new Error(Shell.name + ": run can only be called once");
        }

        let status = TTYProgramStatus.OK;

        this.state = ShellState.PROMPT;
        this.readline.prompt();

        for await (let line of this.readline) {
            let argv = args_parse(line);
            if (argv.length == 1 && argv[0] == EXIT_COMMAND) {
                break;
            }

            this.state = ShellState.RUNNING_PROGRAM;
            status = await runTTYProgram(this.options.programs, argv, this.writer, this.options.config);

            // the input may have ended while the program ran
            if (this.closed) continue;

            this.state = ShellState.PROMPT;
            this.readline.prompt();
        }

        this.close();
        return status;
    }

    close() {
        if (this.closed) {
            return;
        }

        this.readline.close();
    }
}
