import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { CoursesController } from '@infrastructure/http/controllers/courses.controller';
import { CourseQueryDto } from '@infrastructure/http/dtos/request';
import { RequestPipeline } from '@application/pipeline';
import { failure, notFound, success } from '@application/common';
import {
  ChangeCourseStateHandler,
  CreateCourseHandler,
  GetAllCoursesHandler,
  GetAllCoursesQuery,
  GetCourseByIdHandler,
  GetCourseByIdQuery,
  GetCoursesByInstructorHandler,
  PublishCourseCommand,
  ReorderCourseMaterialsCommand,
  ReorderCourseMaterialsHandler,
  UpdateCourseHandler,
} from '@application/use-cases';

describe('CoursesController', () => {
  let controller: CoursesController;
  let mockPipeline: { send: jest.Mock };
  const getAllCourses = { handle: jest.fn() };
  const getCourseById = { handle: jest.fn() };
  const changeCourseState = { handle: jest.fn() };
  const reorderMaterials = { handle: jest.fn() };

  const courseView = { id: 'course-1', title: 'ECG Interpretation' };

  beforeEach(async () => {
    mockPipeline = { send: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CoursesController],
      providers: [
        { provide: RequestPipeline, useValue: mockPipeline },
        { provide: CreateCourseHandler, useValue: { handle: jest.fn() } },
        { provide: UpdateCourseHandler, useValue: { handle: jest.fn() } },
        { provide: ChangeCourseStateHandler, useValue: changeCourseState },
        { provide: ReorderCourseMaterialsHandler, useValue: reorderMaterials },
        { provide: GetAllCoursesHandler, useValue: getAllCourses },
        { provide: GetCourseByIdHandler, useValue: getCourseById },
        { provide: GetCoursesByInstructorHandler, useValue: { handle: jest.fn() } },
      ],
    }).compile();

    controller = module.get<CoursesController>(CoursesController);
  });

  describe('search', () => {
    it('should map query parameters onto the course query', async () => {
      // Arrange
      const page = { items: [], totalCount: 0, page: 2, pageSize: 10, totalPages: 0 };
      mockPipeline.send.mockResolvedValue(success(page));
      const query = Object.assign(new CourseQueryDto(), {
        title: 'ecg',
        tags: 'cardio',
        minDuration: 30,
        sortBy: 'price',
        page: 2,
        pageSize: 10,
      });

      // Act
      const result = await controller.search(query);

      // Assert
      expect(result).toBe(page);
      const [request, handler] = mockPipeline.send.mock.calls[0];
      expect(request).toBeInstanceOf(GetAllCoursesQuery);
      expect(request.titleContains).toBe('ecg');
      expect(request.tagsContains).toBe('cardio');
      expect(request.minDurationMinutes).toBe(30);
      expect(request.sortBy).toBe('price');
      expect(request.page).toBe(2);
      expect(request.pageSize).toBe(10);
      expect(handler).toBe(getAllCourses);
    });

    it('should default to the first page', async () => {
      // Arrange
      mockPipeline.send.mockResolvedValue(success({ items: [] }));

      // Act
      await controller.search(new CourseQueryDto());

      // Assert
      const [request] = mockPipeline.send.mock.calls[0];
      expect(request.page).toBe(0);
      expect(request.pageSize).toBe(25);
    });
  });

  describe('getById', () => {
    it('should return the course', async () => {
      // Arrange
      mockPipeline.send.mockResolvedValue(success(courseView));

      // Act
      const result = await controller.getById('course-1');

      // Assert
      expect(result).toEqual(courseView);
      expect(mockPipeline.send).toHaveBeenCalledWith(expect.any(GetCourseByIdQuery), getCourseById);
    });

    it('should throw NotFoundException when the course does not exist', async () => {
      // Arrange
      mockPipeline.send.mockResolvedValue(notFound('Course not found'));

      // Act & Assert
      await expect(controller.getById('missing')).rejects.toThrow(NotFoundException);
    });
  });

  describe('publish', () => {
    it('should send a publish command to the state handler', async () => {
      // Arrange
      mockPipeline.send.mockResolvedValue(success(courseView));

      // Act
      await controller.publish('course-1');

      // Assert
      const [request, handler] = mockPipeline.send.mock.calls[0];
      expect(request).toBeInstanceOf(PublishCourseCommand);
      expect(handler).toBe(changeCourseState);
    });

    it('should surface business rule failures as bad requests', async () => {
      // Arrange
      mockPipeline.send.mockResolvedValue(failure('Cannot publish course without materials'));

      // Act & Assert
      await expect(controller.publish('course-1')).rejects.toThrow(BadRequestException);
    });
  });

  describe('reorder', () => {
    it('should pass the material order', async () => {
      // Arrange
      mockPipeline.send.mockResolvedValue(success(courseView));

      // Act
      await controller.reorder('course-1', { materialIds: ['material-2', 'material-1'] });

      // Assert
      const [request, handler] = mockPipeline.send.mock.calls[0];
      expect(request).toBeInstanceOf(ReorderCourseMaterialsCommand);
      expect(request.materialIds).toEqual(['material-2', 'material-1']);
      expect(handler).toBe(reorderMaterials);
    });
  });
});
