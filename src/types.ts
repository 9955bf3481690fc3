export type LonLat = [number, number];

export type Fix = {
  readonly lon: number;
  readonly lat: number;
  readonly yaw: number;
  readonly timestamp: number;
};

export type RawFixPayload = {
  lon?: unknown;
  lat?: unknown;
  yaw?: unknown;
  yaw_rad?: unknown;
  timestamp?: unknown;
};

export type Waypoint = {
  lon: number;
  lat: number;
  label: string;
};

export type TurnType =
  | "depart"
  | "straight"
  | "slight_left"
  | "left"
  | "sharp_left"
  | "slight_right"
  | "right"
  | "sharp_right"
  | "uturn"
  | "roundabout"
  | "arrive";

export type Maneuver = {
  position: LonLat;
  turnType: TurnType;
  instructionText: string;
  roadName: string;
  distanceFromStartMeters: number;
};

export type Route = {
  id: string;
  geometry: LonLat[];
  cumulativeMeters: number[];
  totalLengthMeters: number;
  maneuvers: Maneuver[];
  waypoints: Waypoint[];
  distanceMeters: number;
  durationSeconds: number;
  createdAt: number;
};

export type ProgressState = {
  kind: "progress";
  activeRouteId: string;
  nearestSegmentIndex: number;
  alongRouteDistanceMeters: number;
  perpendicularDriftMeters: number;
  projectedPoint: LonLat;
  nextManeuverIndex: number;
  distanceToNextManeuverMeters: number;
  distanceToDestinationMeters: number;
  arrived: boolean;
  fixTimestamp: number;
};

export type ProgressResult = ProgressState | { kind: "no_route" };

export type RerouteState = "ON_ROUTE" | "DRIFTING" | "REROUTING";

export type NavStatusKind = "success" | "no_route" | "error";

export type PublishedTurn =
  | "depart"
  | "left"
  | "right"
  | "straight"
  | "uturn"
  | "roundabout"
  | "arrive";

export type NavStatus = {
  status: NavStatusKind;
  turn_type: PublishedTurn | "";
  turn_m: number;
  destination_m: number | "";
  message: string;
  route_id: string | null;
  nav_state: RerouteState;
};

export type RerouteNotice = {
  rerouted: true;
  route_id: string;
  previous_route_id: string;
  reason: "drift";
  timestamp: number;
};

export type RouteRequest = {
  waypoints: Waypoint[];
  signal?: AbortSignal;
};

export type RoutingEngine = {
  requestRoute: (request: RouteRequest) => Promise<Route>;
};

export type GnssTopic = {
  deviceId: string;
};

export type MessageMeta = {
  qos?: number;
  retain?: boolean;
  dup?: boolean;
};
