/**
 * Kinds of configuration changes reported to listeners.
 */
export const ConfigurationEventType = {
  ADD_PROPERTY: 'addProperty',
  SET_PROPERTY: 'setProperty',
  CLEAR_PROPERTY: 'clearProperty',
  CLEAR_TREE: 'clearTree',
  CLEAR: 'clear',
  ADD_NODES: 'addNodes',
} as const;

export type ConfigurationEventType =
  (typeof ConfigurationEventType)[keyof typeof ConfigurationEventType];
