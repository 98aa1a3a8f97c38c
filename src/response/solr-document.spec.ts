import { IsNumber, IsOptional, IsString } from 'class-validator';
import { SolrDecodeError } from '../common/errors/solr.error';
import { SolrDocument, declaredFields, decodeDocument, serializeDocument } from './solr-document';

class Product extends SolrDocument {
  @IsString()
  name!: string;

  @IsOptional()
  @IsNumber()
  price?: number;
}

describe('SolrDocument', () => {
  it('should list declared fields including inherited ones', () => {
    expect(declaredFields(Product)).toEqual(new Set(['id', 'name', 'price']));
  });

  it('should keep undeclared fields as additional fields', () => {
    const product = decodeDocument(Product, { id: '1', name: 'Mouse', price: 10, color: 'red' });

    expect(product).toBeInstanceOf(Product);
    expect(product.name).toBe('Mouse');
    expect(product.price).toBe(10);
    expect(product.additionalFields).toEqual({ color: 'red' });
  });

  it('should keep a __proto__ field as an own additional field', () => {
    const raw: unknown = JSON.parse('{"id":"1","name":"Mouse","__proto__":{"x":1}}');

    const product = decodeDocument(Product, raw);

    expect(Object.keys(product.additionalFields)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(product.additionalFields, '__proto__')?.value).toEqual({ x: 1 });
    expect(Object.getPrototypeOf(product.additionalFields)).toBe(Object.prototype);
  });

  it('should report fields that do not match the document class', () => {
    expect.assertions(3);
    try {
      decodeDocument(Product, { id: '1', price: 'cheap' });
    } catch (error) {
      expect(error).toBeInstanceOf(SolrDecodeError);
      expect(error instanceof SolrDecodeError && error.message).toBe('Document does not match Product');
      expect(error instanceof SolrDecodeError && error.violations).toEqual([
        'name: name must be a string',
        'price: price must be a number conforming to the specified constraints',
      ]);
    }
  });

  it('should reject a document that is not an object', () => {
    expect(() => decodeDocument(Product, 'x')).toThrow('Expected a document object for Product');
  });

  it('should merge additional fields back when serializing', () => {
    const product = decodeDocument(Product, { id: '1', name: 'Mouse', color: 'red' });

    expect(serializeDocument(product)).toEqual({ id: '1', name: 'Mouse', color: 'red' });
  });

  it('should copy plain records as they are', () => {
    const record = { id: '2', title: 'Keyboard' };

    expect(serializeDocument(record)).toEqual(record);
    expect(serializeDocument(record)).not.toBe(record);
  });
});
