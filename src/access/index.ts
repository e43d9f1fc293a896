export { AccessController, type OwnerGuard } from "./access-controller.js";
