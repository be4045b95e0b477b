export {
  credentialsDetailsGet,
  defaultSwitchDelete,
  defaultSwitchGet,
  defaultSwitchSave,
  robotSwitchDelete,
  robotSwitchGet,
  robotSwitchSave,
  userSwitchDelete,
  userSwitchGet,
  userSwitchSave,
} from './credentials.js';
export { createDescriptor, validateInput, withQuery } from './descriptor.js';
export { fabricGet, fabricsGet } from './fabrics.js';
export { CREDENTIALS, FABRICS, MANAGE, SWITCHES } from './paths.js';
export { switchesInventoryGet } from './switches.js';
