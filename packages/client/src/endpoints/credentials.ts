import {
  switchCredentialInputSchema,
  userSwitchDeleteInputSchema,
  userSwitchSaveInputSchema,
} from '../schemas/endpoints.js';
import type {
  SwitchCredentialInput,
  UserSwitchDeleteInput,
  UserSwitchSaveInput,
} from '../types/endpoints.js';
import type { RequestDescriptor } from '../types/request.js';
import { createDescriptor, validateInput } from './descriptor.js';
import { CREDENTIALS } from './paths.js';

const DEFAULT_SWITCH = `${CREDENTIALS}/defaultSwitchCredentials`;
const ROBOT_SWITCH = `${CREDENTIALS}/robotSwitchCredentials`;
const USER_SWITCHES = `${CREDENTIALS}/switches`;

export function credentialsDetailsGet(): RequestDescriptor {
  return createDescriptor('GET', `${CREDENTIALS}/details`, 'Get Credentials Details');
}

export function defaultSwitchGet(): RequestDescriptor {
  return createDescriptor('GET', DEFAULT_SWITCH, 'Get Default Switch Credentials');
}

/**
 * Save the credentials used for every switch without user credentials
 */
export function defaultSwitchSave(input: SwitchCredentialInput): RequestDescriptor {
  const description = 'Save Default Switch Credentials';
  const { switch_username, switch_password } = validateInput(
    input,
    switchCredentialInputSchema,
    description,
  );
  return createDescriptor('POST', DEFAULT_SWITCH, description, {
    switchUsername: switch_username,
    switchPassword: switch_password,
  });
}

export function defaultSwitchDelete(): RequestDescriptor {
  return createDescriptor('DELETE', DEFAULT_SWITCH, 'Delete Default Switch Credentials');
}

export function robotSwitchGet(): RequestDescriptor {
  return createDescriptor('GET', ROBOT_SWITCH, 'Get Robot Switch Credentials');
}

/**
 * Save the credentials the controller uses for its own automation
 */
export function robotSwitchSave(input: SwitchCredentialInput): RequestDescriptor {
  const description = 'Save Robot Switch Credentials';
  const { switch_username, switch_password } = validateInput(
    input,
    switchCredentialInputSchema,
    description,
  );
  return createDescriptor('POST', ROBOT_SWITCH, description, {
    switchUsername: switch_username,
    switchPassword: switch_password,
    isRobot: true,
  });
}

export function robotSwitchDelete(): RequestDescriptor {
  return createDescriptor('DELETE', ROBOT_SWITCH, 'Delete Robot Switch Credentials');
}

export function userSwitchGet(): RequestDescriptor {
  return createDescriptor('GET', USER_SWITCHES, 'Get User Switch Credentials');
}

/**
 * Save per-switch credentials; switches are addressed by serial number
 */
export function userSwitchSave(input: UserSwitchSaveInput): RequestDescriptor {
  const description = 'Save User Switch Credentials';
  const { switch_ids, switch_username, switch_password } = validateInput(
    input,
    userSwitchSaveInputSchema,
    description,
  );
  return createDescriptor('POST', USER_SWITCHES, description, {
    switchIds: switch_ids.map((switchId) => ({ switchId })),
    switchUsername: switch_username,
    switchPassword: switch_password,
  });
}

export function userSwitchDelete(input: UserSwitchDeleteInput): RequestDescriptor {
  const description = 'Delete User Switch Credentials';
  const { switch_ids } = validateInput(input, userSwitchDeleteInputSchema, description);
  return createDescriptor('POST', `${USER_SWITCHES}/actions/remove`, description, {
    switchIds: switch_ids,
  });
}
