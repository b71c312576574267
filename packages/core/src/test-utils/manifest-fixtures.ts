import { ManifestHost, type ManifestClass } from '../host/manifest-host.js';
import { isErr, type Result } from '../types/result.js';

/** Host over the given classes; throws when the manifest is invalid */
export function manifestHost(classes: ManifestClass[]): ManifestHost {
  return ManifestHost.fromDocument({ classes }).unwrap();
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (isErr(result)) {
    return result.error;
  }
  throw new Error(`Expected an Err result, got Ok(${JSON.stringify(result.value)})`);
}

export const PERSON: ManifestClass = {
  name: 'Person',
  properties: [
    { name: 'name', kind: 'string' },
    { name: 'age', kind: 'int' },
  ],
};

export const PERSON_WITH_GENDER: ManifestClass = {
  name: 'Person',
  enums: { Gender: { MALE: 0, FEMALE: 1 } },
  properties: [
    { name: 'Person', kind: 'nil', usage: ['CATEGORY'] },
    { name: 'person.gd', kind: 'string', usage: ['STORAGE'] },
    { name: 'name', kind: 'string' },
    { name: 'age', kind: 'int' },
    {
      name: 'gender',
      kind: 'int',
      className: 'Person.Gender',
      usage: ['STORAGE', 'EDITOR', 'CLASS_IS_ENUM'],
    },
  ],
};

/** Tree node whose children are nodes: a class graph with a cycle */
export const TREE_NODE: ManifestClass = {
  name: 'TreeNode',
  properties: [
    { name: 'value', kind: 'int' },
    { name: 'children', kind: 'array', hint: 'array_type', hintString: 'TreeNode' },
  ],
};

export const OWNER_AND_PET: ManifestClass[] = [
  {
    name: 'Owner',
    properties: [
      { name: 'name', kind: 'string' },
      { name: 'pets', kind: 'array', hint: 'array_type', hintString: 'Pet' },
    ],
  },
  {
    name: 'Pet',
    properties: [
      { name: 'nickname', kind: 'string' },
      { name: 'position', kind: 'vector2' },
    ],
  },
];
