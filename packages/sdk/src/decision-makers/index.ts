export * as buyAndHold from "./buy_and_hold.js";
export * as smaCrossover from "./sma_crossover.js";
export * as rsiReversion from "./rsi_reversion.js";
