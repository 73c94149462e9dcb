import { ICourseRepositoryPort, IUserRepositoryPort } from '@application/ports';
import { CreateCourseCommand, CreateCourseHandler, CreateCourseInput } from '@application/use-cases';
import { Course } from '@domain/entities';
import { createCourseRepositoryMock, createTestUser, createUserRepositoryMock } from '../fixtures';

describe('CreateCourseHandler', () => {
  let courseRepository: jest.Mocked<ICourseRepositoryPort>;
  let userRepository: jest.Mocked<IUserRepositoryPort>;
  let handler: CreateCourseHandler;

  const input: CreateCourseInput = {
    instructorId: 'instructor-1',
    title: 'Point-of-Care Ultrasound',
    description: 'Bedside ultrasound for internal medicine',
    category: 'Radiology',
    price: 120,
    currency: 'eur',
    tags: ['ultrasound', 'imaging'],
    materials: [
      { title: 'Probe handling', fileUrl: 'https://cdn.test/probe.mp4', fileType: 'video', orderIndex: 2 },
      { title: 'Physics primer', fileUrl: 'https://cdn.test/physics.pdf', fileType: 'pdf', orderIndex: 1 },
    ],
  };

  beforeEach(() => {
    courseRepository = createCourseRepositoryMock();
    userRepository = createUserRepositoryMock();
    handler = new CreateCourseHandler(courseRepository, userRepository);
  });

  it('should create an unpublished course with sorted materials', async () => {
    // Arrange
    userRepository.findById.mockResolvedValue(
      createTestUser({ id: 'instructor-1', role: 'instructor' }),
    );

    // Act
    const result = await handler.handle(new CreateCourseCommand(input));

    // Assert
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.title).toBe('Point-of-Care Ultrasound');
    expect(result.value.price).toBe(120);
    expect(result.value.currency).toBe('EUR');
    expect(result.value.isPublished).toBe(false);
    expect(result.value.materials.map((material) => material.title)).toEqual([
      'Physics primer',
      'Probe handling',
    ]);
    expect(courseRepository.save).toHaveBeenCalledWith(expect.any(Course));
  });

  it('should return not found for an unknown instructor', async () => {
    userRepository.findById.mockResolvedValue(null);

    const result = await handler.handle(new CreateCourseCommand(input));

    expect(result).toEqual({
      ok: false,
      kind: 'not_found',
      errors: ['Instructor with ID instructor-1 not found'],
    });
    expect(courseRepository.save).not.toHaveBeenCalled();
  });

  it('should refuse a student as instructor', async () => {
    userRepository.findById.mockResolvedValue(createTestUser({ id: 'instructor-1' }));

    const result = await handler.handle(new CreateCourseCommand(input));

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['User instructor-1 is not an instructor'],
    });
  });
});
