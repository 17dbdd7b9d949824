export { ConfigRepository } from "./repository";
