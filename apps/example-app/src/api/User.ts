import { isPlainRecord } from '@restbind/http-api';
import { userRouter } from './routers';

/**
 * User - Immutable; builds itself from JSON through fromJson().
 */
@userRouter.get('/{userId:int}')
export class User {
    constructor(
        readonly id: number,
        readonly name: string,
        readonly email: string,
    ) {}

    static fromJson(data: unknown): User {
        if (!isPlainRecord(data)) {
            throw new Error('a user must be a JSON object');
        }
        const { id, name, email } = data;
        if (typeof id !== 'number' || typeof name !== 'string' || typeof email !== 'string') {
            throw new Error('a user needs a numeric id, a name and an email');
        }
        return new User(id, name, email);
    }

    toJson(): unknown {
        return { id: this.id, name: this.name, email: this.email };
    }
}
