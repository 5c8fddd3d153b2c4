export interface Attribute {
  key: string;
  value: string;
}

export type AttributeValue = string | number | bigint | boolean;

export function attr(key: string, value: AttributeValue): Attribute {
  return { key, value: value.toString() };
}

export class Event {
  readonly attributes: Attribute[] = [];

  constructor(readonly type: string) {}

  addAttribute(key: string, value: AttributeValue): this {
    this.attributes.push(attr(key, value));
    return this;
  }

  addAttributes(attributes: Iterable<Attribute>): this {
    for (const attribute of attributes) {
      this.attributes.push(attribute);
    }
    return this;
  }
}
