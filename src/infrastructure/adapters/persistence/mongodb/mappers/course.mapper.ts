import { Course, CourseMaterial } from '@domain/entities';
import {
  DIFFICULTY_LEVELS,
  EntityId,
  Money,
  Url,
  parseEnumeration,
} from '@domain/value-objects';
import { CourseDocument, CourseMaterialDocument } from '../schemas';

/**
 * Mapper for converting between the Course aggregate and MongoDB document.
 * Materials travel with the course as embedded subdocuments.
 */
export class CourseMapper {
  static toDomain(document: CourseDocument): Course {
    return Course.reconstitute(EntityId.fromString(document._id), {
      instructorId: EntityId.fromString(document.instructorId),
      title: document.title,
      description: document.description,
      shortDescription: document.shortDescription ?? null,
      content: document.content ?? null,
      category: document.category,
      difficultyLevel: document.difficultyLevel
        ? parseEnumeration(DIFFICULTY_LEVELS, document.difficultyLevel, 'DifficultyLevel')
        : null,
      tags: [...document.tags],
      price: Money.fromCents(document.priceCents, document.currency),
      durationMinutes: document.durationMinutes ?? null,
      maxStudents: document.maxStudents ?? null,
      thumbnailUrl: Url.ofNullable(document.thumbnailUrl),
      videoIntroUrl: Url.ofNullable(document.videoIntroUrl),
      isPublished: document.isPublished,
      publishedAt: document.publishedAt ?? null,
      deletedAt: document.deletedAt ?? null,
      materials: document.materials.map((material) => this.materialToDomain(material)),
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(course: Course): CourseDocument {
    const document = new CourseDocument();
    document._id = course.id.toString();
    document.instructorId = course.instructorId.toString();
    document.title = course.title;
    document.description = course.description;
    document.shortDescription = course.shortDescription;
    document.content = course.content;
    document.category = course.category;
    document.difficultyLevel = course.difficultyLevel;
    document.tags = [...course.tags];
    document.priceCents = course.price.cents;
    document.currency = course.price.currency;
    document.durationMinutes = course.durationMinutes;
    document.maxStudents = course.maxStudents;
    document.thumbnailUrl = course.thumbnailUrl?.toString() ?? null;
    document.videoIntroUrl = course.videoIntroUrl?.toString() ?? null;
    document.isPublished = course.isPublished;
    document.publishedAt = course.publishedAt;
    document.deletedAt = course.deletedAt;
    document.materials = course.materials.map((material) => this.materialToDocument(material));
    document.createdAt = course.createdAt;
    document.updatedAt = course.updatedAt;
    return document;
  }

  private static materialToDomain(document: CourseMaterialDocument): CourseMaterial {
    return CourseMaterial.reconstitute(EntityId.fromString(document.id), {
      title: document.title,
      description: document.description ?? null,
      fileUrl: Url.of(document.fileUrl),
      fileType: document.fileType,
      fileName: document.fileName ?? null,
      fileSizeBytes: document.fileSizeBytes ?? null,
      orderIndex: document.orderIndex,
      isFree: document.isFree,
      isRequired: document.isRequired,
      durationMinutes: document.durationMinutes ?? null,
    });
  }

  private static materialToDocument(material: CourseMaterial): CourseMaterialDocument {
    const document = new CourseMaterialDocument();
    document.id = material.id.toString();
    document.title = material.title;
    document.description = material.description;
    document.fileUrl = material.fileUrl.toString();
    document.fileType = material.fileType;
    document.fileName = material.fileName;
    document.fileSizeBytes = material.fileSizeBytes;
    document.orderIndex = material.orderIndex;
    document.isFree = material.isFree;
    document.isRequired = material.isRequired;
    document.durationMinutes = material.durationMinutes;
    return document;
  }
}
