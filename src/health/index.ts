export { evaluateHealth } from "./healthReporter";
export {
  createHealthApp,
  listenHealthServer,
  closeHealthServer,
  boundPort,
} from "./healthServer";
