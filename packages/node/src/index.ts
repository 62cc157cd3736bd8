/**
 * @rerun-ui/node
 *
 * Server side of the widget value sync protocol: encodes widget calls made by
 * a rerunning script and keeps committed widget values per session.
 */

export {
  BUTTON_GROUP_WIDGET_TYPE,
  encodeButtonGroup,
  type ButtonGroupCall,
  type ButtonGroupOptionInput,
  type EncodedButtonGroup,
  type EncoderContext,
} from "./encoder/buttonGroup.js";
export { WIDGET_ID_PREFIX, computeWidgetId } from "./encoder/widgetId.js";
export {
  BUNDLED_ICON_SET_PATH,
  createDefaultIconRegistry,
  loadIconSet,
  parseIconSet,
} from "./icons/loadIconSet.js";
export { createWidgetSessionState, type WidgetSessionState } from "./session/widgetState.js";
export {
  createScriptRunContext,
  type ScriptFn,
  type ScriptRunCollector,
  type ScriptRunContext,
} from "./session/scriptRun.js";
export {
  createAppSession,
  type AppSession,
  type AppSessionOptions,
  type RunResult,
  type SessionClient,
} from "./session/appSession.js";
export {
  createSessionManager,
  type ConnectSessionOptions,
  type SessionInfo,
  type SessionManager,
  type SessionManagerOptions,
} from "./session/sessionManager.js";
