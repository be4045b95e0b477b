/**
 * Base paths of the controller's manage API
 */
export const MANAGE = '/api/v1/manage';
export const CREDENTIALS = `${MANAGE}/credentials`;
export const FABRICS = `${MANAGE}/fabrics`;
export const SWITCHES = `${MANAGE}/switches`;
