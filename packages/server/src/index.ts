export {
  FormServer,
  createFormServer,
  type FormServerConfig,
  type ListenOptions,
  type RunResponse,
} from "./FormServer.js";
export { normalizeError } from "./formServer/errors.js";
export { saveUploads, removeFiles, uploadFileName } from "./formServer/uploads.js";
