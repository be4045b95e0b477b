export { BaseResource, type Dispatch } from './base.js';
export { CredentialsResource } from './credentials.js';
export { FabricsResource } from './fabrics.js';
export { SwitchesResource } from './switches.js';
