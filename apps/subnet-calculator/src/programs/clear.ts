import { type TTYProgram, type TTYProgramInitializer, type TTYProgramMetaData, TTYProgramStatus } from "./types";

export const ttyProgramClear: TTYProgram = Object.assign<TTYProgramInitializer, TTYProgramMetaData>((writer) => ({
    run() {
        writer.clear();
        return Promise.resolve(TTYProgramStatus.OK);
    },
}), {
    about: {
        description: "Clears the screen.",
        content: "  clear",
    },
});
