import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { Course, CourseMaterial } from '@domain/entities';
import { EntityId, Money, Url } from '@domain/value-objects';
import { MongoCourseRepository } from '@infrastructure/adapters/persistence/mongodb/repositories';
import { CourseDocument } from '@infrastructure/adapters/persistence/mongodb/schemas';
import { CourseMapper } from '@infrastructure/adapters/persistence/mongodb/mappers';
import { AggregateWriter } from '@infrastructure/adapters/persistence/mongodb/aggregate-writer';
import { MongoSessionContext } from '@infrastructure/adapters/persistence/mongodb/mongo-session.context';

interface MockQuery {
  sort: jest.Mock;
  skip: jest.Mock;
  limit: jest.Mock;
  session: jest.Mock;
  lean: jest.Mock;
  exec: jest.Mock;
}

const mockQuery = (result: unknown): MockQuery => {
  const query: MockQuery = {
    sort: jest.fn(),
    skip: jest.fn(),
    limit: jest.fn(),
    session: jest.fn(),
    lean: jest.fn(),
    exec: jest.fn().mockResolvedValue(result),
  };
  query.sort.mockReturnValue(query);
  query.skip.mockReturnValue(query);
  query.limit.mockReturnValue(query);
  query.session.mockReturnValue(query);
  query.lean.mockReturnValue(query);
  return query;
};

describe('MongoCourseRepository', () => {
  let repository: MongoCourseRepository;
  let mockModel: {
    find: jest.Mock;
    findById: jest.Mock;
    findByIdAndUpdate: jest.Mock;
    countDocuments: jest.Mock;
  };
  let mockWriter: { save: jest.Mock; timed: jest.Mock };

  const createTestCourse = (): Course => {
    const course = Course.create({
      id: EntityId.fromString('course-1'),
      instructorId: EntityId.fromString('instructor-1'),
      price: Money.of(89, 'USD'),
      details: {
        title: 'ECG Interpretation',
        description: 'Reading 12-lead ECGs',
        category: 'Cardiology',
        tags: ['ecg'],
      },
    });
    course.addMaterial(
      CourseMaterial.create(
        {
          title: 'Workbook',
          fileUrl: Url.of('https://files.example.test/workbook.pdf'),
          fileType: 'pdf',
          orderIndex: 0,
        },
        EntityId.fromString('material-1'),
      ),
    );
    return course;
  };

  beforeEach(async () => {
    mockModel = {
      find: jest.fn(),
      findById: jest.fn(),
      findByIdAndUpdate: jest.fn(),
      countDocuments: jest.fn(),
    };
    mockWriter = {
      save: jest.fn().mockResolvedValue(null),
      timed: jest.fn((_operation: string, _collection: string, query: () => Promise<unknown>) =>
        query(),
      ),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoCourseRepository,
        MongoSessionContext,
        { provide: getModelToken(CourseDocument.name), useValue: mockModel },
        { provide: AggregateWriter, useValue: mockWriter },
      ],
    }).compile();

    repository = module.get<MongoCourseRepository>(MongoCourseRepository);
  });

  describe('save', () => {
    it('should hand the mapped document to the aggregate writer', async () => {
      // Arrange
      const course = createTestCourse();

      // Act
      await repository.save(course);

      // Assert
      expect(mockWriter.save).toHaveBeenCalledWith(
        expect.objectContaining({
          collection: 'courses',
          entityName: 'Course',
          aggregate: course,
          document: expect.objectContaining({ _id: 'course-1', priceCents: 8900 }),
        }),
      );
    });

    it('should upsert by id without rewriting the id', async () => {
      // Arrange
      const query = mockQuery(null);
      mockModel.findByIdAndUpdate.mockReturnValue(query);
      await repository.save(createTestCourse());
      const { upsert } = mockWriter.save.mock.calls[0][0];

      // Act
      await upsert(null);

      // Assert
      const [id, update, options] = mockModel.findByIdAndUpdate.mock.calls[0];
      expect(id).toBe('course-1');
      expect(update.$set._id).toBeUndefined();
      expect(update.$set.title).toBe('ECG Interpretation');
      expect(options).toEqual({ upsert: true, session: null });
    });
  });

  describe('findById', () => {
    it('should map the stored document back to a course', async () => {
      // Arrange
      mockModel.findById.mockReturnValue(mockQuery(CourseMapper.toDocument(createTestCourse())));

      // Act
      const result = await repository.findById(EntityId.fromString('course-1'));

      // Assert
      expect(result).toBeInstanceOf(Course);
      expect(result?.title).toBe('ECG Interpretation');
      expect(result?.materials.map((material) => material.id.toString())).toEqual(['material-1']);
      expect(mockModel.findById).toHaveBeenCalledWith('course-1');
    });

    it('should return null when not found', async () => {
      // Arrange
      mockModel.findById.mockReturnValue(mockQuery(null));

      // Act & Assert
      expect(await repository.findById(EntityId.fromString('missing'))).toBeNull();
    });
  });

  describe('search', () => {
    it('should translate criteria into a MongoDB filter', async () => {
      // Arrange
      const findQuery = mockQuery([CourseMapper.toDocument(createTestCourse())]);
      mockModel.find.mockReturnValue(findQuery);
      mockModel.countDocuments.mockReturnValue(mockQuery(11));

      // Act
      const result = await repository.search(
        {
          isPublished: true,
          isActive: true,
          titleContains: 'ecg (basic)',
          currency: 'usd',
          minPrice: 10,
          maxPrice: 99.99,
          minDurationMinutes: 30,
          sortBy: 'price',
          sortDirection: 'asc',
        },
        { page: 1, pageSize: 10 },
      );

      // Assert
      const expectedFilter = {
        isPublished: true,
        deletedAt: null,
        title: { $regex: 'ecg \\(basic\\)', $options: 'i' },
        currency: 'USD',
        priceCents: { $gte: 1000, $lte: 9999 },
        durationMinutes: { $gte: 30 },
      };
      expect(mockModel.find).toHaveBeenCalledWith(expectedFilter);
      expect(mockModel.countDocuments).toHaveBeenCalledWith(expectedFilter);
      expect(findQuery.sort).toHaveBeenCalledWith({ priceCents: 1, _id: 1 });
      expect(findQuery.skip).toHaveBeenCalledWith(10);
      expect(findQuery.limit).toHaveBeenCalledWith(10);
      expect(result.totalCount).toBe(11);
      expect(result.items).toHaveLength(1);
    });

    it('should match inactive courses by their deletion date', async () => {
      // Arrange
      mockModel.find.mockReturnValue(mockQuery([]));
      mockModel.countDocuments.mockReturnValue(mockQuery(0));

      // Act
      await repository.search({ isActive: false }, { page: 0, pageSize: 25 });

      // Assert
      expect(mockModel.find).toHaveBeenCalledWith({ deletedAt: { $ne: null } });
    });

    it('should sort newest first by default', async () => {
      // Arrange
      const findQuery = mockQuery([]);
      mockModel.find.mockReturnValue(findQuery);
      mockModel.countDocuments.mockReturnValue(mockQuery(0));

      // Act
      await repository.search({}, { page: 0, pageSize: 25 });

      // Assert
      expect(mockModel.find).toHaveBeenCalledWith({});
      expect(findQuery.sort).toHaveBeenCalledWith({ createdAt: -1, _id: 1 });
      expect(findQuery.skip).toHaveBeenCalledWith(0);
    });

    it('should time the query as a find on courses', async () => {
      // Arrange
      mockModel.find.mockReturnValue(mockQuery([]));
      mockModel.countDocuments.mockReturnValue(mockQuery(0));

      // Act
      await repository.search({}, { page: 0, pageSize: 25 });

      // Assert
      expect(mockWriter.timed).toHaveBeenCalledWith('find', 'courses', expect.any(Function));
    });
  });
});
