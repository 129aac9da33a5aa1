import type { CalculatorConfig } from "../config";
import { ttyProgramCalc } from "./calc";
import { ttyProgramClear } from "./clear";
import { ttyProgramHelp } from "./help";
import { ttyProgramList } from "./list";
import { type TTYPrograms, TTYProgramStatus, type TTYWriter } from "./types";

export * from "./helpers";
export * from "./types";

export function registerTTYPrograms(): TTYPrograms {
    return {
        help: ttyProgramHelp,
        calc: ttyProgramCalc,
        list: ttyProgramList,
        clear: ttyProgramClear,
    };
};

/** runs `argv[0]` with the remaining arguments, an empty line does nothing */
export function runTTYProgram(programs: TTYPrograms, argv: string[], writer: TTYWriter, config: CalculatorConfig): Promise<TTYProgramStatus> {
    if (argv.length == 0) {
        return Promise.resolve(TTYProgramStatus.OK);
    }

    let [name, ...rest] = argv;
    if (!Object.hasOwn(programs, name)) {
        writer.write(`${name}: program not found, try "help"\n`);
        return Promise.resolve(TTYProgramStatus.ERROR);
    }

    return programs[name](writer, config, programs).run(rest);
}
