import { parseConfigFlags } from "./config";
import { registerTTYPrograms, runTTYProgram, TTYProgramStatus, type TTYWriter } from "./programs/program";
import Shell from "./shell";

const writer: TTYWriter = {
    write: (text) => { process.stdout.write(text); },
    clear: () => console.clear(),
};

async function main(argv: string[]): Promise<number> {
    let { config, rest } = parseConfigFlags(argv);
    let programs = registerTTYPrograms();

    // `subnet-calculator calc 10.0.0.1/8` runs once, no arguments starts the shell
    let status = rest.length
        ? await runTTYProgram(programs, rest, writer, config)
        : await new Shell({
            input: process.stdin,
            output: process.stdout,
            programs,
            config,
            terminal: process.stdin.isTTY,
        }).run();

    return status == TTYProgramStatus.OK ? 0 : 1;
}

main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (error) => {
        console.error(error);
        process.exitCode = 1;
    }
);
