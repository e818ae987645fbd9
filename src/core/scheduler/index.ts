export {
  type CycleRunner,
  Scheduler,
  type SchedulerOptions,
  type SchedulerStatus,
  type Sleep,
} from "./daemon";
