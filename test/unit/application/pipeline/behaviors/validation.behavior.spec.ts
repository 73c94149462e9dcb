import { IsNotEmpty, MaxLength } from 'class-validator';
import { RequestValidationError } from '@application/errors';
import { Query, ValidationBehavior } from '@application/pipeline';
import { CreateCourseCommand, GetCourseByIdQuery } from '@application/use-cases';

class LookupQuery extends Query<string> {
  @IsNotEmpty({ message: 'Name is required.' })
  @MaxLength(5, { message: 'Name is too long.' })
  readonly name: string;

  constructor(name: string) {
    super();
    this.name = name;
  }
}

describe('ValidationBehavior', () => {
  let behavior: ValidationBehavior;
  let next: jest.Mock;

  beforeEach(() => {
    behavior = new ValidationBehavior();
    next = jest.fn().mockResolvedValue('handled');
  });

  it('should call the handler for a valid request', async () => {
    const response = await behavior.handle(new LookupQuery('abc'), next);

    expect(response).toBe('handled');
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should return a validation failure for result requests', async () => {
    const response = await behavior.handle(new GetCourseByIdQuery(''), next);

    expect(response).toEqual({
      ok: false,
      kind: 'validation',
      errors: ['Course ID is required.'],
    });
    expect(next).not.toHaveBeenCalled();
  });

  it('should throw for requests that have no failure response', async () => {
    await expect(behavior.handle(new LookupQuery('too long'), next)).rejects.toThrow(
      new RequestValidationError('LookupQuery', ['Name is too long.']),
    );
  });

  it('should accept a request without declared rules', async () => {
    class PingQuery extends Query<string> {}

    await expect(behavior.handle(new PingQuery(), next)).resolves.toBe('handled');
  });

  it('should report errors of nested materials', async () => {
    const command = new CreateCourseCommand({
      instructorId: 'instructor-1',
      title: 'Clinical Pharmacology',
      description: 'Drug interactions for residents',
      category: 'Pharmacology',
      price: 49.99,
      materials: [{ title: '', fileUrl: 'https://cdn.test/notes.pdf', fileType: 'pdf', orderIndex: 0 }],
    });

    const response = await behavior.handle(command, next);

    expect(response.ok).toBe(false);
    expect(response.ok ? [] : response.errors).toContain('Material title is required.');
  });
});
