export const PROGRAM_NAME = "dirstat";
export const RECURSIVE_FLAG = "-r";
export const DEFAULT_PATH = ".";
export const PATH_SEPARATOR = "/";
export const USAGE = `Usage: ${PROGRAM_NAME} [${RECURSIVE_FLAG}] [<directory>]`;
