export { openSession, startBridge } from "./start.js";
export type { BridgeSession, StartOptions } from "./start.js";
export { listCameras, listDevices, listMics } from "./inspect.js";
