import { Identifier } from '../shared/vos/Identifier';
import { uuidv4 } from '../utils/uuid';

export class GroupId extends Identifier {
  readonly kind = 'GroupId';

  private constructor(value: string) {
    super(value, 'groupId');
  }

  static create(): GroupId {
    return new GroupId(uuidv4());
  }

  static from(value: string): GroupId {
    return new GroupId(value);
  }
}
