/**
 * Remote server response codes
 */

export type ResponseCode =
  | 'success'
  | 'connection_error'
  | 'unknown'
  | 'license_key_not_found'
  | 'license_key_association_mismatch'
  | 'license_key_locked'
  | 'license_key_owing_balance'
  | 'remote_script_error'
  | 'transaction_id_not_found'
  | 'already_redeemed'
  | 'vn_not_part_of_package'
  | 'license_key_not_private'
  | 'updated_license';

const TEXT_CODES: Record<string, ResponseCode> = {
  ok: 'success',
  'ok-save': 'success',
  'ok-updated_license': 'updated_license',
  'error-license_key_not_found': 'license_key_not_found',
  'error-license_key_not_associated_with_provided_vn': 'license_key_association_mismatch',
  'error-license_key_locked': 'license_key_locked',
  'error-license_key_owing_balance': 'license_key_owing_balance',
  'error-script': 'remote_script_error',
  'error-transaction_id_not_found': 'transaction_id_not_found',
  'error-already_redeemed': 'already_redeemed',
  'error-vn_not_part_of_package': 'vn_not_part_of_package',
  'error-license_key_not_private': 'license_key_not_private',
};

/**
 * Map server response text to a code
 */
export function responseCodeFromText(text: string): ResponseCode {
  if (Object.hasOwn(TEXT_CODES, text)) {
    return TEXT_CODES[text] ?? 'unknown';
  }
  if (text.startsWith('ok-script-')) return 'success';
  return 'unknown';
}
