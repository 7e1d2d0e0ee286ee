/**
 * Configuration entrypoint.
 *
 * Role in system:
 * - Re-exports env loading, flag tokenizing and the command option schemas.
 */
export * from "./constants";
export * from "./env";
export * from "./args";
export * from "./definitions";
