export {
  handleMonitorRequest,
  listEvents,
  listIndices,
  type MonitorResponse
} from "./routes";
export { closeMonitorServer, createMonitorServer, startMonitorServer } from "./server";
