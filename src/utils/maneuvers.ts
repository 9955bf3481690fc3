import type { TurnType } from "../types";

const ROUNDABOUT_TYPES = new Set([
  "roundabout",
  "rotary",
  "roundabout turn",
  "exit roundabout",
  "exit rotary",
]);

export function turnTypeFromOsrm(
  type: string | undefined,
  modifier: string | undefined,
): TurnType {
  const normalizedType = (type ?? "").toLowerCase();
  if (normalizedType === "depart") return "depart";
  if (normalizedType === "arrive") return "arrive";
  if (ROUNDABOUT_TYPES.has(normalizedType)) return "roundabout";

  switch ((modifier ?? "").toLowerCase()) {
    case "uturn":
      return "uturn";
    case "sharp left":
      return "sharp_left";
    case "left":
      return "left";
    case "slight left":
      return "slight_left";
    case "sharp right":
      return "sharp_right";
    case "right":
      return "right";
    case "slight right":
      return "slight_right";
    default:
      return "straight";
  }
}

function verbFor(turnType: TurnType): string {
  switch (turnType) {
    case "depart":
      return "Head out";
    case "straight":
      return "Continue straight";
    case "slight_left":
      return "Bear left";
    case "left":
      return "Turn left";
    case "sharp_left":
      return "Turn sharp left";
    case "slight_right":
      return "Bear right";
    case "right":
      return "Turn right";
    case "sharp_right":
      return "Turn sharp right";
    case "uturn":
      return "Make a U-turn";
    case "roundabout":
      return "Take the roundabout";
    case "arrive":
      return "Arrive at destination";
  }
}

export function describeManeuver(turnType: TurnType, roadName: string): string {
  const verb = verbFor(turnType);
  const road = roadName.trim();
  if (!road || turnType === "arrive") return verb;
  return turnType === "depart" ? `${verb} on ${road}` : `${verb} onto ${road}`;
}
