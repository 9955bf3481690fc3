import { createRouteStore } from "../services/routeStore";
import { threeTurnRoute } from "./fixtures";

describe("route store", () => {
  test("starts empty", () => {
    const store = createRouteStore();
    expect(store.get()).toBeNull();
    expect(store.revision()).toBe(0);
  });

  test("freezes routes on the way in", () => {
    const store = createRouteStore();
    const route = store.set(threeTurnRoute());

    expect(Object.isFrozen(route)).toBe(true);
    expect(Object.isFrozen(route.geometry)).toBe(true);
    expect(Object.isFrozen(route.geometry[0])).toBe(true);
    expect(Object.isFrozen(route.maneuvers[1])).toBe(true);
    expect(store.get()).toBe(route);
  });

  test("every set and clear bumps the revision", () => {
    const store = createRouteStore();
    store.set(threeTurnRoute("route-a"));
    store.set(threeTurnRoute("route-b"));
    const cleared = store.clear();

    expect(cleared?.id).toBe("route-b");
    expect(store.get()).toBeNull();
    expect(store.revision()).toBe(3);
  });

  test("replaceIfRevision swaps only when nothing changed", () => {
    const store = createRouteStore();
    store.set(threeTurnRoute("route-a"));
    const revision = store.revision();

    expect(store.replaceIfRevision(revision, threeTurnRoute("route-b"))).toBe(
      true,
    );
    expect(store.get()?.id).toBe("route-b");

    expect(store.replaceIfRevision(revision, threeTurnRoute("route-c"))).toBe(
      false,
    );
    expect(store.get()?.id).toBe("route-b");
  });

  test("replaceIfRevision never revives a cleared route", () => {
    const store = createRouteStore();
    store.set(threeTurnRoute("route-a"));
    store.clear();

    expect(
      store.replaceIfRevision(store.revision(), threeTurnRoute("route-b")),
    ).toBe(false);
    expect(store.get()).toBeNull();
  });
});
