import type { VenueEvent } from "./types.js";

/**
 * Global FIFO of live events held back while a resync window is open.
 *
 * Opening hands out a generation token; only the holder of the current token
 * can drain and close the window. A reset starts a new generation, so a drain
 * from an older window stops instead of closing the new one.
 */
export class ActionQueue {
    private items: VenueEvent[] | null = null;
    private generation = 0;

    get isOpen(): boolean {
        return this.items !== null;
    }

    get length(): number {
        return this.items?.length ?? 0;
    }

    /** Open the window; returns a token, or null when it was already open. */
    open(): number | null {
        if (this.items !== null) {
            return null;
        }
        this.items = [];
        return ++this.generation;
    }

    /** Discard whatever is queued and open a fresh window. */
    reset(): number {
        this.items = [];
        return ++this.generation;
    }

    append(event: VenueEvent): void {
        if (this.items === null) {
            throw new Error("Action queue is closed");
        }
        this.items.push(event);
    }

    shift(token: number): VenueEvent | undefined {
        if (token !== this.generation) {
            return undefined;
        }
        return this.items?.shift();
    }

    /** Close the window; returns the events that were still queued. */
    close(token: number): VenueEvent[] {
        if (token !== this.generation || this.items === null) {
            return [];
        }
        const left = this.items;
        this.items = null;
        return left;
    }
}
