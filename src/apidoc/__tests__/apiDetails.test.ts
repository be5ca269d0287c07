import { extractApiDetails, identityKey } from '../apiDetails';

describe('extractApiDetails', () => {
  test('reads name, group and version tags', () => {
    const d = extractApiDetails('/**\n* @api {get} /u U\n* @apiName GetUser\n* @apiGroup User\n* @apiVersion 2.10.0\n*/');
    expect(d).toEqual({
      identity: { name: 'GetUser', group: 'User' },
      key: 'GetUser__User',
      version: '2.10.0',
    });
  });

  test('falls back to Unnamed / Ungrouped and leaves version undefined', () => {
    const d = extractApiDetails('/**\n* @api {get} /u U\n*/');
    expect(d.identity).toEqual({ name: 'Unnamed', group: 'Ungrouped' });
    expect(d.key).toBe('Unnamed__Ungrouped');
    expect(d.version).toBeUndefined();
  });

  test('same name and group share an identity across versions', () => {
    const a = extractApiDetails('@apiName GetUser\n@apiGroup User\n@apiVersion 1.0.0');
    const b = extractApiDetails('@apiName GetUser\n@apiGroup User\n@apiVersion 1.1.0');
    expect(a.key).toBe(b.key);
    expect(a.version).not.toBe(b.version);
  });

  test('version keeps only the leading digits and dots', () => {
    expect(extractApiDetails('@apiVersion 1.2.3-beta').version).toBe('1.2.3');
    expect(extractApiDetails('@apiVersion v1.2').version).toBeUndefined();
  });

  test('the first occurrence of a tag wins', () => {
    const d = extractApiDetails('@apiName First\n@apiName Second\n@apiGroup G');
    expect(d.identity.name).toBe('First');
  });

  test('tag names must be followed by whitespace', () => {
    expect(extractApiDetails('@apiNameX Foo').identity.name).toBe('Unnamed');
  });
});

describe('identityKey', () => {
  test('joins name and group with a double underscore', () => {
    expect(identityKey({ name: 'A', group: 'B' })).toBe('A__B');
  });
});
