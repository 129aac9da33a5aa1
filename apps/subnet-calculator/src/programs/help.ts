import { type TTYProgram, type TTYProgramInitializer, type TTYProgramMetaData, TTYProgramStatus } from "./types";
import { formatTable } from "./helpers";

export const ttyProgramHelp: TTYProgram = Object.assign<TTYProgramInitializer, TTYProgramMetaData>((writer, config, programs) => ({
    run(argv) {
        return new Promise(resolve => {
            if (argv.length == 0) {
                let row = ["Program", "Description"];
                let rows = Object.keys(programs).map(name => [name, programs[name].about.description]);

                writer.write(formatTable([row].concat(rows), "  ") + "\n");
                return resolve(TTYProgramStatus.OK);
            }

            let [name] = argv;
            if (!Object.hasOwn(programs, name)) {
                writer.write(`${name}: program not found\n`);
                return resolve(TTYProgramStatus.ERROR);
            }

            let { about } = programs[name];
            writer.write(`${name}:  ${about.description}\n${about.content}\n`);
            resolve(TTYProgramStatus.OK);
        });
    },
}), {
    about: {
        description: "Displays information about programs.",
        content: [
            "  help              lists the available programs",
            "  help <program>    describes the program",
        ].join("\n"),
    },
});
