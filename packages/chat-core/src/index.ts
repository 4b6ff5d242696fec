export * from "./types";
export * from "./errors";
export * from "./irc/tags";
export * from "./irc/ircParser";
export * from "./irc/lineBuffer";
export * from "./irc/encode";
export * from "./trovo/capability";
export * from "./trovo/userConfig";
export * from "./trovo/badges";
export * from "./trovo/emotes";
export * from "./trovo/color";
export * from "./trovo/classify";
export * from "./client/dispatcher";
export * from "./client/rateLimit";
export * from "./client/writeQueue";
export * from "./client/writer";
export * from "./client/registration";
export * from "./client/stream";
export * from "./client/client";
