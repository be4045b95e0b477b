import {
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
} from '../endpoints/index.js';
import type {
  SwitchCredentialInput,
  UserSwitchDeleteInput,
  UserSwitchSaveInput,
} from '../types/endpoints.js';
import type { NormalizedResult } from '../types/response.js';
import { BaseResource } from './base.js';

/**
 * Switch credentials API resource
 */
export class CredentialsResource extends BaseResource {
  /**
   * Get the controller's credential store details
   */
  async details(): Promise<NormalizedResult> {
    return this.dispatch(credentialsDetailsGet());
  }

  async getDefaultSwitch(): Promise<NormalizedResult> {
    return this.dispatch(defaultSwitchGet());
  }

  /**
   * Save default switch credentials
   * @throws {ValidationError} if username or password is empty
   */
  async saveDefaultSwitch(input: SwitchCredentialInput): Promise<NormalizedResult> {
    return this.dispatch(defaultSwitchSave(input));
  }

  async deleteDefaultSwitch(): Promise<NormalizedResult> {
    return this.dispatch(defaultSwitchDelete());
  }

  async getRobotSwitch(): Promise<NormalizedResult> {
    return this.dispatch(robotSwitchGet());
  }

  /**
   * Save robot switch credentials
   * @throws {ValidationError} if username or password is empty
   */
  async saveRobotSwitch(input: SwitchCredentialInput): Promise<NormalizedResult> {
    return this.dispatch(robotSwitchSave(input));
  }

  async deleteRobotSwitch(): Promise<NormalizedResult> {
    return this.dispatch(robotSwitchDelete());
  }

  async listUserSwitches(): Promise<NormalizedResult> {
    return this.dispatch(userSwitchGet());
  }

  /**
   * Save credentials for specific switches, by serial number
   */
  async saveUserSwitches(input: UserSwitchSaveInput): Promise<NormalizedResult> {
    return this.dispatch(userSwitchSave(input));
  }

  async deleteUserSwitches(input: UserSwitchDeleteInput): Promise<NormalizedResult> {
    return this.dispatch(userSwitchDelete(input));
  }
}
