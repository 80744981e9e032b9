// SPDX-License-Identifier: Apache-2.0

import {type ObjectMapper} from '../api/object-mapper.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';
import {instanceToPlain, plainToInstance} from 'class-transformer';
import {ObjectMappingError} from '../api/object-mapping-error.js';
import {injectable} from 'tsyringe-neo';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

@injectable()
export class ClassToObjectMapper implements ObjectMapper {
  public fromArray<T>(cls: ClassConstructor<T>, array: object[]): T[] {
    const result: T[] = [];
    for (const item of array) {
      result.push(this.fromObject(cls, item));
    }
    return result;
  }

  public fromObject<T>(cls: ClassConstructor<T>, object: object): T {
    if (typeof object !== 'object' || object === null || Array.isArray(object)) {
      throw new IllegalArgumentError(`expected a plain object to map into '${cls.name}'`, object);
    }

    try {
      return plainToInstance(cls, object, {exposeUnsetFields: false});
    } catch (error) {
      throw new ObjectMappingError(`Error converting object to class instance [ cls = '${cls.name}' ]`, error);
    }
  }

  public toArray<T>(data: readonly T[]): object[] {
    const result: object[] = [];

    for (const item of data) {
      result.push(this.toObject(item));
    }
    return result;
  }

  public toObject<T>(data: T): object {
    try {
      return instanceToPlain(data);
    } catch (error) {
      const className: string = typeof data === 'object' && data !== null ? data.constructor.name : typeof data;
      throw new ObjectMappingError(`Error converting class instance to object [ cls = '${className}' ]`, error);
    }
  }
}
