// SPDX-License-Identifier: Apache-2.0

/**
 * A class whose instances can be created without arguments, as object mappers do before populating them.
 */
export type ClassConstructor<T> = {
  new (): T;
};
