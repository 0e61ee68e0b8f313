import { defineGlyph, type GlyphShape } from "./glyph.js";

const CROSSBARS: GlyphShape[] = [
    { type: "rect", x0: 0.2, y0: 0.4, x1: 0.8, y1: 0.5 },
    { type: "rect", x0: 0.2, y0: 0.7, x1: 0.8, y1: 0.8 },
];

// stem plus a hollow bowl at the foot
export const flatGenerator = defineGlyph("Flat", [
    { type: "rect", x0: 0.4, y0: 0.1, x1: 0.5, y1: 0.9 },
    { type: "ellipse", cx: 0.6, cy: 0.75, rx: 0.25, ry: 0.2 },
    { type: "ellipse", cx: 0.6, cy: 0.75, rx: 0.15, ry: 0.12, erase: true },
]);

export const sharpGenerator = defineGlyph("Sharp", [
    { type: "rect", x0: 0.4, y0: 0.1, x1: 0.5, y1: 0.9 },
    { type: "rect", x0: 0.6, y0: 0.1, x1: 0.7, y1: 0.9 },
    ...CROSSBARS,
]);

export const naturalGenerator = defineGlyph("Natural", [
    { type: "rect", x0: 0.3, y0: 0.1, x1: 0.4, y1: 0.8 },
    { type: "rect", x0: 0.6, y0: 0.3, x1: 0.7, y1: 0.9 },
    ...CROSSBARS,
]);

export const doubleSharpGenerator = defineGlyph("DoubleSharp", [
    {
        type: "polygon",
        points: [
            [0.2, 0.2],
            [0.3, 0.2],
            [0.8, 0.7],
            [0.7, 0.8],
        ],
    },
    {
        type: "polygon",
        points: [
            [0.2, 0.7],
            [0.3, 0.8],
            [0.8, 0.3],
            [0.7, 0.2],
        ],
    },
]);
