export * from "./MediaOrganizeService";
export {
  MediaOrganizeServiceDefault,
  defaultExecuteWorkers,
  defaultPlanWorkers,
} from "./MediaOrganizeServiceDefault";
