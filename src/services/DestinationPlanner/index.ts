export * from "./DestinationPlanner";
export { DestinationPlannerDefault } from "./DestinationPlannerDefault";
export * from "./CollisionResolver";
export { PathReservations } from "./PathReservations";
