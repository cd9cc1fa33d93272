import {
  PipeTransform,
  Injectable,
  BadRequestException,
} from "@nestjs/common";
import type { ZodTypeAny, output } from "zod";

@Injectable()
export class ZodPipe<T extends ZodTypeAny>
  implements PipeTransform<unknown, output<T>>
{
  constructor(private schema: T) {}

  transform(value: unknown): output<T> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const errors = result.error.errors.map(
        (e) => `${e.path.join(".")}: ${e.message}`,
      );
      throw new BadRequestException({ message: "Validation failed", errors });
    }
    return result.data;
  }
}
