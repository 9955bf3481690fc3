import type {
  NavStatus,
  ProgressResult,
  PublishedTurn,
  RerouteState,
  Route,
  TurnType,
} from "../types";
import { describeManeuver } from "../utils/maneuvers";
import { roundTo } from "../utils/numbers";

export type NavStatusInput = {
  route: Route | null;
  progress: ProgressResult;
  rerouteError: string | null;
  navState: RerouteState;
};

export const NO_ROUTE_MESSAGE = "Route not created yet";
export const WAITING_FOR_FIX_MESSAGE = "Waiting for GNSS fix";

export function toPublishedTurn(turnType: TurnType): PublishedTurn {
  switch (turnType) {
    case "depart":
      return "depart";
    case "slight_left":
    case "left":
    case "sharp_left":
      return "left";
    case "slight_right":
    case "right":
    case "sharp_right":
      return "right";
    case "straight":
      return "straight";
    case "uturn":
      return "uturn";
    case "roundabout":
      return "roundabout";
    case "arrive":
      return "arrive";
  }
}

function errorStatus(
  message: string,
  route: Route | null,
  navState: RerouteState,
): NavStatus {
  return {
    status: "error",
    turn_type: "",
    turn_m: 0,
    destination_m: "",
    message,
    route_id: route?.id ?? null,
    nav_state: navState,
  };
}

/** Pure snapshot of what a polling client should show. */
export function buildNavStatus(input: NavStatusInput): NavStatus {
  const { route, progress, rerouteError, navState } = input;

  if (!route) {
    return {
      status: "no_route",
      turn_type: "",
      turn_m: 0,
      destination_m: "",
      message: NO_ROUTE_MESSAGE,
      route_id: null,
      nav_state: navState,
    };
  }

  if (rerouteError !== null) {
    return errorStatus(`Reroute failed: ${rerouteError}`, route, navState);
  }

  if (progress.kind === "no_route" || progress.activeRouteId !== route.id) {
    return errorStatus(WAITING_FOR_FIX_MESSAGE, route, navState);
  }

  const maneuver =
    progress.nextManeuverIndex >= 0
      ? route.maneuvers[progress.nextManeuverIndex]
      : undefined;
  const turnType: TurnType = maneuver?.turnType ?? "straight";
  const message =
    maneuver && maneuver.instructionText.trim()
      ? maneuver.instructionText
      : describeManeuver(turnType, maneuver?.roadName ?? "");

  return {
    status: "success",
    turn_type: toPublishedTurn(turnType),
    turn_m: roundTo(progress.distanceToNextManeuverMeters, 1),
    destination_m: roundTo(progress.distanceToDestinationMeters, 1),
    message,
    route_id: route.id,
    nav_state: navState,
  };
}
