import { ItemKind } from "../shared/types.js";
import { COLORS, GLYPHS } from "../shared/constants.js";

export interface ItemTemplate {
  name: string;
  glyph: string;
  color: string;
}

export const ITEM_TEMPLATES: Record<ItemKind, ItemTemplate> = {
  [ItemKind.Heal]: { name: "healing potion", glyph: GLYPHS.potion, color: COLORS.violet },
  [ItemKind.Lightning]: { name: "scroll of lightning bolt", glyph: GLYPHS.scroll, color: COLORS.lightYellow },
  [ItemKind.Fireball]: { name: "scroll of fireball", glyph: GLYPHS.scroll, color: COLORS.lightYellow },
  [ItemKind.Confuse]: { name: "scroll of confusion", glyph: GLYPHS.scroll, color: COLORS.lightYellow },
};
