import { newGame } from "./sim/state.js";
import { createRng } from "./sim/rng.js";
import { ShadowcastingVisibility, refreshVision } from "./sim/vision.js";
import { renderToString } from "./render/terminal.js";
import { DEFAULT_CONFIG, GOLDEN_SEED } from "./shared/constants.js";

const arg = process.argv[2];
const seed = arg !== undefined && /^-?\d+$/.test(arg) ? Number(arg) : GOLDEN_SEED;

const config = DEFAULT_CONFIG;
const state = newGame(config, createRng(seed), seed);
const visibility = new ShadowcastingVisibility(() => state.map);
refreshVision(state, visibility, config.torchRadius, config.fovLightWalls);

console.log(renderToString(state, visibility));
console.log("\nCrypt Crawl v0.1.0");
console.log("Seed:", seed);
