export const CATALOG_STORE = Symbol('CATALOG_STORE');
export const ID_GENERATOR = Symbol('ID_GENERATOR');
export const CLOCK = Symbol('CLOCK');
export const IMAGE_STORE = Symbol('IMAGE_STORE');

export type IdGenerator = () => string;
export type Clock = () => Date;

export const CHANGESET_COMMITTED_EVENT = 'catalog.changeset.committed';
