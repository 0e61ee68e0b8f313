/**
 * Simple seeded pseudo-random number generator
 * Uses a linear congruential generator (LCG) so a generation seed always
 * reproduces the same glyph placement.
 */

export class SeededRNG {
    private state: number;

    constructor(seed: number) {
        // LCG state must be a positive 32-bit integer
        this.state = (Math.floor(Math.abs(seed)) % 2 ** 32) || 1;
    }

    /**
     * Returns a random number between 0 (inclusive) and 1 (exclusive)
     */
    random(): number {
        // LCG parameters (from Numerical Recipes)
        this.state = (this.state * 1664525 + 1013904223) % 2 ** 32;
        return this.state / 2 ** 32;
    }

    /**
     * Returns a random integer between min (inclusive) and max (exclusive)
     */
    randomInt(min: number, max: number): number {
        return Math.floor(this.random() * (max - min)) + min;
    }
}
