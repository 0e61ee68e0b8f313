import { defineGlyph } from "./glyph.js";

export const trebleGenerator = defineGlyph("Treble", [
    // head
    {
        type: "polygon",
        points: [
            [0.5, 0.05],
            [0.7, 0.1],
            [0.5, 0.15],
            [0.3, 0.1],
        ],
    },
    // stem
    {
        type: "polygon",
        points: [
            [0.5, 0.1],
            [0.55, 0.1],
            [0.55, 0.9],
            [0.45, 0.9],
        ],
    },
    // sweep across the stem
    {
        type: "polygon",
        points: [
            [0.3, 0.7],
            [0.7, 0.6],
            [0.7, 0.7],
            [0.3, 0.8],
        ],
    },
]);
