import { IsBoolean, IsInt, IsString, MinLength } from 'class-validator';
import { todoRouter } from './routers';

/**
 * Todo - Validated with class-validator when a response is decoded.
 */
@todoRouter.get('', { listOf: true })
@todoRouter.get('/{id:int}')
@todoRouter.post('')
@todoRouter.put('/{id:int}')
@todoRouter.delete('/{id:int}')
export class Todo {
    @IsInt()
    id!: number;

    @IsString()
    @MinLength(1)
    title!: string;

    @IsBoolean()
    completed!: boolean;
}

/**
 * Body of POST /todos.
 */
export interface NewTodo {
    title: string;
    completed?: boolean;
}
