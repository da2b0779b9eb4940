import { Expression, IExpressionVisitor, IFieldExpression } from './Expression';
import { PropertyKind } from '../model/ModelSchema';

/**
 * Represents a reference to a (possibly nested) field of the queried model
 * Example: name, address.city
 */
export class FieldExpression extends Expression implements IFieldExpression {
  constructor(
    private readonly path: readonly string[],
    private readonly kind: PropertyKind = PropertyKind.Unknown,
  ) {
    super();
    if (path.length === 0) {
      throw new Error('A field expression needs at least one path segment');
    }
  }

  /**
   * Gets the path segments
   */
  getPath(): readonly string[] {
    return this.path;
  }

  /**
   * Gets the dotted field name
   */
  getFieldName(): string {
    return this.path.join('.');
  }

  /**
   * Gets the value kind of the field
   */
  getKind(): PropertyKind {
    return this.kind;
  }

  /**
   * Accepts a visitor
   */
  accept<T>(visitor: IExpressionVisitor<T>): T {
    return visitor.visitFieldExpression(this);
  }
}
