export * from "./tictactoe/types.ts";
export * from "./tictactoe/board.ts";
export * from "./tictactoe/tictactoe.ts";
export * from "./tictactoe/search.ts";
