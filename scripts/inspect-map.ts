import { generate } from "../src/sim/procgen.js";
import { createRng } from "../src/sim/rng.js";
import { DEFAULT_CONFIG, GLYPHS, GOLDEN_SEED } from "../src/shared/constants.js";

const seed = Number(process.argv[2] ?? GOLDEN_SEED);
const depth = Number(process.argv[3] ?? 1);
const level = generate(depth, DEFAULT_CONFIG, createRng(seed));

console.log("=== MAP ===");
for (let y = 0; y < level.map.length; y++) {
  let row = "";
  for (let x = 0; x < level.map[y].length; x++) {
    const e = level.entities.find(en => en.pos.x === x && en.pos.y === y);
    if (level.playerStart.x === x && level.playerStart.y === y) row += GLYPHS.player;
    else if (e) row += e.glyph;
    else row += level.map[y][x].blocked ? GLYPHS.wall : GLYPHS.floor;
  }
  console.log(y.toString().padStart(2) + ": " + row);
}

console.log("\nROOMS:");
level.rooms.forEach((r, i) =>
  console.log(`  ${i} at (${r.x1},${r.y1}) to (${r.x2},${r.y2})`)
);

console.log("\nENTITIES:");
for (const e of level.entities) {
  const stats = e.fighter ? ` hp ${e.fighter.hp} def ${e.fighter.defense} pow ${e.fighter.power}` : "";
  console.log(`  ${e.name.padEnd(26)} (${e.pos.x},${e.pos.y})${stats}`);
}

console.log(`\nStart (${level.playerStart.x},${level.playerStart.y})  Stairs (${level.stairs.x},${level.stairs.y})`);
