import { describe, it, expect } from 'vitest';

import {
  parseUserDocumentPath,
  roleForToken,
  userDocumentPath,
} from '../../../../src/modules/users/user.paths';

describe('user paths', () => {
  it('maps roles to their partition directories and back', () => {
    expect(userDocumentPath('VOLUNTEER', 'alice')).toBe('Volunteer/alice/user_data.json');
    expect(userDocumentPath('ORGANIZER', 'org1')).toBe('Organizer/org1/user_data.json');
    expect(parseUserDocumentPath('Organizer/org1/user_data.json')).toEqual({
      role: 'ORGANIZER',
      username: 'org1',
    });
    expect(parseUserDocumentPath('Organizer/org1/other.json')).toBeUndefined();
  });

  it('reads the claimed role from a token prefix', () => {
    expect(roleForToken('vol_0a1b2c')).toBe('VOLUNTEER');
    expect(roleForToken('org_0a1b2c')).toBe('ORGANIZER');
    expect(roleForToken('adm_0a1b2c')).toBeUndefined();
    expect(roleForToken('0a1b2c')).toBeUndefined();
  });
});
