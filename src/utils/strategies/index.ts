import local from "./local";

export { local };
