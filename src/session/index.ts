/**
 * Auth State Module
 */

export {
  observeAuthState,
  type AuthStateObserver,
  type ObserveAuthStateOptions,
} from "./auth-state.js";
export { AuthStateChannel, type AuthStateChannelOptions } from "./auth-state-channel.js";
