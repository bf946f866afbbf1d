export type { CollectorOptions } from "./types";
export { collectLocal, extractPort, parseLsofFields } from "./local";
export { collectSsh, extractSshHost, parseSshForwards } from "./ssh";
export {
  collectDocker,
  collectFromContainer,
  getContainerIp,
  parseDockerPs,
  parseSsOutput
} from "./docker";
