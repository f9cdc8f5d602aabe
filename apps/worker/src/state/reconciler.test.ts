import { describe, it, expect, beforeEach } from "vitest";
import { DEFAULT_RECONCILE_TUNING } from "@venue-state/shared";
import { ActionQueue } from "./actionQueue.js";
import { ClockedBookStore } from "./bookStore.js";
import { BookTopCache } from "./bookTop.js";
import { ContractRegistry } from "./contracts.js";
import { OutOfOrderStash } from "./outOfOrderStash.js";
import { OwnOrders } from "./ownOrders.js";
import { PositionTracker } from "./positions.js";
import { LOADING_CLOCK, ReconciliationController } from "./reconciler.js";
import { DelayedTaskScheduler } from "./scheduler.js";
import { FakeSnapshotApi, makeContract, makeEntry, makeReport } from "../testing/fakeVenue.js";

/** Let every pending promise chain run */
function flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

describe("ReconciliationController", () => {
    let api: FakeSnapshotApi;
    let registry: ContractRegistry;
    let store: ClockedBookStore;
    let tops: BookTopCache;
    let stash: OutOfOrderStash;
    let queue: ActionQueue;
    let reconciler: ReconciliationController;

    function build(reloadOnTopMismatch = false) {
        const own = new OwnOrders();
        store = new ClockedBookStore(own);
        tops = new BookTopCache();
        stash = new OutOfOrderStash();
        queue = new ActionQueue();
        const positions = new PositionTracker({
            api,
            registry,
            scheduler: new DelayedTaskScheduler(10),
            tuning: DEFAULT_RECONCILE_TUNING,
            skipExpired: true,
        });
        reconciler = new ReconciliationController({
            api,
            registry,
            own,
            store,
            tops,
            stash,
            queue,
            positions,
            tuning: { reloadOnTopMismatch },
        });
    }

    beforeEach(() => {
        api = new FakeSnapshotApi();
        const contract = makeContract(1);
        api.addContract(contract, {
            clock: 10,
            entries: [
                makeEntry(1, "m-a", { price: 900, size: 2, clock: 8 }),
                makeEntry(1, "m-b", { price: 1100, isAsk: true, clock: 9 }),
            ],
        });
        registry = new ContractRegistry(api);
        registry.add(contract);
        build();
    });

    it("loads the book on the first event and applies it when it is next", async () => {
        const applied = await reconciler.handleActionReport(makeReport(1, 11, { mid: "x", price: 950 }));

        expect(applied).toBe(true);
        expect(api.bookFetches(1)).toBe(1);
        expect(reconciler.getContractClock(1)).toBe(11);
        expect(store.getTop(1)).toEqual({ contractId: 1, bid: 950, ask: 1100, clock: 11, synthetic: true });
        expect(tops.get(1)?.bid).toBe(950);
        expect(queue.isOpen).toBe(false);
    });

    it("drops events the clock already covers", async () => {
        await reconciler.loadBooks(1);

        expect(await reconciler.handleActionReport(makeReport(1, 10, { mid: "old" }))).toBe(false);
        expect(await reconciler.handleActionReport(makeReport(1, 11, { mid: "next" }))).toBe(true);
        expect(await reconciler.handleActionReport(makeReport(1, 11, { mid: "next" }))).toBe(false);
        expect(reconciler.getContractClock(1)).toBe(11);
        expect(store.getBookState(1).has("old")).toBe(false);
    });

    it("reloads on a gap and applies the event when the snapshot precedes it", async () => {
        await reconciler.loadBooks(1);
        api.setBook(1, 12);

        expect(await reconciler.handleActionReport(makeReport(1, 13, { mid: "late" }))).toBe(true);
        expect(api.bookFetches(1)).toBe(2);
        expect(reconciler.getContractClock(1)).toBe(13);
        expect([...store.getBookState(1).keys()]).toEqual(["late"]);
    });

    it("reloads on a gap and skips an event the snapshot already contains", async () => {
        await reconciler.loadBooks(1);
        api.setBook(1, 15, [makeEntry(1, "covered", { clock: 14 })]);

        expect(await reconciler.handleActionReport(makeReport(1, 14, { mid: "covered" }))).toBe(false);
        expect(reconciler.getContractClock(1)).toBe(15);
    });

    it("restores the prior clock when a reload fails", async () => {
        await reconciler.loadBooks(1);
        api.failingBooks.add(1);

        expect(await reconciler.handleActionReport(makeReport(1, 15))).toBe(false);
        expect(reconciler.phase(1)).toBe("live");
        expect(reconciler.getContractClock(1)).toBe(10);
        expect(reconciler.stats()).toMatchObject({ pendingReloads: 1, failedReloads: 1, reloads: 2 });
        expect(reconciler.selectStale(10)).toEqual([1]);
    });

    it("leaves a never-loaded contract unloaded when its reload fails", async () => {
        const contract = makeContract(2);
        api.addContract(contract);
        registry.add(contract);
        api.failingBooks.add(2);

        expect(await reconciler.loadBooks(2)).toBe(false);
        expect(reconciler.phase(2)).toBe("unloaded");
        expect(reconciler.getContractClock(2)).toBeUndefined();
    });

    it("stashes own events during a reload and applies them after the snapshot", async () => {
        api.setBook(1, 11);
        const gate = api.holdBooks(1);
        const loading = reconciler.loadBooks(1);
        await flush();

        expect(reconciler.phase(1)).toBe("loading");
        expect(reconciler.getContractClock(1)).toBe(LOADING_CLOCK);

        const own = makeReport(1, 12, { mid: "own-1", mpid: "M1" });
        expect(await reconciler.handleActionReport(own)).toBe(false);
        expect(stash.total).toBe(1);

        gate.release();
        expect(await loading).toBe(true);
        expect(reconciler.getContractClock(1)).toBe(12);
        expect(stash.total).toBe(0);
        expect(store.getBookState(1).has("own-1")).toBe(true);
    });

    it("queues foreign events that reach a book during its reload", async () => {
        const gate = api.holdBooks(1);
        const loading = reconciler.loadBooks(1);
        await flush();

        expect(await reconciler.handleActionReport(makeReport(1, 11, { mid: "f11" }))).toBe(false);
        expect(stash.total).toBe(0);
        expect(queue.length).toBe(1);

        gate.release();
        await loading;
        expect(reconciler.getContractClock(1)).toBe(11);
        expect(store.getBookState(1).has("f11")).toBe(true);
        expect(queue.isOpen).toBe(false);
    });

    it("extends the stash with consecutive own events without reloading", async () => {
        await reconciler.loadBooks(1);

        expect(await reconciler.handleActionReport(makeReport(1, 12, { mid: "o12", mpid: "M1" }))).toBe(false);
        expect(await reconciler.handleActionReport(makeReport(1, 13, { mid: "o13", mpid: "M1" }))).toBe(false);

        expect(stash.size(1)).toBe(2);
        expect(api.bookFetches(1)).toBe(1);
        expect(reconciler.getContractClock(1)).toBe(10);
    });

    it("keeps a stashed own event when its public copy arrives", async () => {
        await reconciler.loadBooks(1);
        await reconciler.handleActionReport(makeReport(1, 12, { mid: "o12", mpid: "M1" }));

        expect(await reconciler.handleActionReport(makeReport(1, 12, { mid: "o12" }))).toBe(false);
        expect(stash.size(1)).toBe(1);
        expect(stash.first(1)?.mpid).toBe("M1");
        expect(api.bookFetches(1)).toBe(1);

        expect(await reconciler.handleActionReport(makeReport(1, 11, { mid: "f11" }))).toBe(true);
        expect(reconciler.getContractClock(1)).toBe(12);
        expect(store.getBookState(1).has("o12")).toBe(true);
        expect(stash.total).toBe(0);
    });

    it("reaches the same book whether own events arrive in order or not", async () => {
        async function replay(clocks: number[]) {
            build();
            await reconciler.loadBooks(1);
            for (const clock of clocks) {
                await reconciler.handleActionReport(makeReport(1, clock, { mid: `o${clock}`, mpid: "M1" }));
            }
            return {
                clock: reconciler.getContractClock(1),
                book: [...store.getBookState(1).entries()].sort(([a], [b]) => a.localeCompare(b)),
                stashed: stash.total,
            };
        }

        const shuffled = await replay([12, 13, 11]);
        const ordered = await replay([11, 12, 13]);

        expect(shuffled.clock).toBe(13);
        expect(shuffled.stashed).toBe(0);
        expect(shuffled).toEqual(ordered);
        expect(shuffled.book.map(([mid]) => mid)).toEqual(["m-a", "m-b", "o11", "o12", "o13"]);
    });

    it("discards a snapshot fetched before a reset", async () => {
        const gate = api.holdBooks(1);
        const loading = reconciler.loadBooks(1);
        await flush();

        reconciler.clear();
        gate.release();

        expect(await loading).toBe(false);
        expect(reconciler.phase(1)).toBe("unloaded");
        expect(store.has(1)).toBe(false);
    });

    it("replays an inconsistent stash and lets the snapshot decide", async () => {
        await reconciler.loadBooks(1);
        api.setBook(1, 11);

        expect(await reconciler.handleActionReport(makeReport(1, 12, { mid: "own-a", mpid: "M1" }))).toBe(false);
        expect(stash.total).toBe(1);

        const applied = await reconciler.handleActionReport(makeReport(1, 12, { mid: "own-b", mpid: "M1" }));

        expect(applied).toBe(true);
        expect(reconciler.getContractClock(1)).toBe(12);
        expect(store.getBookState(1).has("own-b")).toBe(true);
        expect(store.getBookState(1).has("own-a")).toBe(false);
        expect(stash.total).toBe(0);
        expect(queue.isOpen).toBe(false);
        expect(api.bookFetches(1)).toBe(3);
    });

    it("only warns on an equal-clock top mismatch by default", async () => {
        await reconciler.loadBooks(1);

        const event = { type: "book_top" as const, contractId: 1, clock: 10, bid: 905, ask: 1100 };
        expect(await reconciler.handleBookTop(event)).toBe(false);
        expect(store.hasReloadFlag(1)).toBe(false);
    });

    it("flags the book on a top mismatch when configured to", async () => {
        build(true);
        await reconciler.loadBooks(1);

        const event = { type: "book_top" as const, contractId: 1, clock: 10, bid: 905, ask: 1100 };
        expect(await reconciler.handleBookTop(event)).toBe(false);
        expect(store.hasReloadFlag(1)).toBe(true);
        expect(reconciler.selectStale(10)).toEqual([1]);
    });

    it("fetches and schedules a reload for a top on an unknown contract", async () => {
        api.addContract(makeContract(3));

        const event = { type: "book_top" as const, contractId: 3, clock: 4, bid: 100, ask: null };
        expect(await reconciler.handleBookTop(event)).toBe(false);
        expect(registry.has(3)).toBe(true);
        expect(reconciler.stats().pendingReloads).toBe(1);
    });

    it("reloads a book whose top stays ahead of its clock for two heartbeats", async () => {
        await reconciler.loadBooks(1);
        expect(reconciler.selectStale(10)).toEqual([]);

        const event = { type: "book_top" as const, contractId: 1, clock: 12, bid: 900, ask: 1100 };
        expect(await reconciler.handleBookTop(event)).toBe(true);

        expect(reconciler.selectStale(10)).toEqual([]);
        expect(reconciler.selectStale(10)).toEqual([1]);

        api.setBook(1, 12);
        expect(await reconciler.runStaleSweep(10)).toBe(1);
        expect(reconciler.getContractClock(1)).toBe(12);
        expect(reconciler.selectStale(10)).toEqual([]);
    });

    it("reports unloaded contracts in stats", async () => {
        const contract = makeContract(2);
        api.addContract(contract);
        registry.add(contract);

        await reconciler.loadBooks(1);
        expect(reconciler.stats()).toMatchObject({ unloaded: 1, loading: 0, live: 1 });
    });
});
