import type { Route } from "../types";

export type RouteStore = {
  set: (route: Route) => Route;
  get: () => Route | null;
  clear: () => Route | null;
  revision: () => number;
  replaceIfRevision: (expectedRevision: number, route: Route) => boolean;
};

function freezeRoute(route: Route): Route {
  if (Object.isFrozen(route)) return route;

  for (const vertex of route.geometry) Object.freeze(vertex);
  for (const maneuver of route.maneuvers) {
    Object.freeze(maneuver.position);
    Object.freeze(maneuver);
  }
  for (const waypoint of route.waypoints) Object.freeze(waypoint);
  Object.freeze(route.geometry);
  Object.freeze(route.cumulativeMeters);
  Object.freeze(route.maneuvers);
  Object.freeze(route.waypoints);
  return Object.freeze(route);
}

/**
 * Single slot holding the active route. Routes are frozen on the way in and
 * swapped by reference, so a reader holds either the old or the new route.
 */
export function createRouteStore(): RouteStore {
  let active: Route | null = null;
  let currentRevision = 0;

  function set(route: Route): Route {
    const frozen = freezeRoute(route);
    active = frozen;
    currentRevision += 1;
    return frozen;
  }

  function get(): Route | null {
    return active;
  }

  function clear(): Route | null {
    const previous = active;
    active = null;
    currentRevision += 1;
    return previous;
  }

  function revision(): number {
    return currentRevision;
  }

  function replaceIfRevision(expectedRevision: number, route: Route): boolean {
    if (expectedRevision !== currentRevision || active === null) {
      return false;
    }
    set(route);
    return true;
  }

  return { set, get, clear, revision, replaceIfRevision };
}
