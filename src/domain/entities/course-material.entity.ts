import { BusinessRuleViolationException } from '../exceptions';
import { EntityId, Url } from '../value-objects';

export interface CourseMaterialProps {
  title: string;
  description: string | null;
  fileUrl: Url;
  fileType: string;
  fileName: string | null;
  fileSizeBytes: number | null;
  orderIndex: number;
  isFree: boolean;
  isRequired: boolean;
  durationMinutes: number | null;
}

export type NewCourseMaterialProps = Pick<
  CourseMaterialProps,
  'title' | 'fileUrl' | 'fileType' | 'orderIndex'
> &
  Partial<Omit<CourseMaterialProps, 'title' | 'fileUrl' | 'fileType' | 'orderIndex'>>;

/**
 * A file or video that belongs to a course. Lives inside the Course aggregate.
 */
export class CourseMaterial {
  private constructor(
    public readonly id: EntityId,
    private readonly props: Readonly<CourseMaterialProps>,
  ) {
    this.validate();
  }

  static create(props: NewCourseMaterialProps, id?: EntityId): CourseMaterial {
    return new CourseMaterial(id ?? EntityId.generate(), {
      title: props.title.trim(),
      description: props.description ?? null,
      fileUrl: props.fileUrl,
      fileType: props.fileType.trim(),
      fileName: props.fileName ?? null,
      fileSizeBytes: props.fileSizeBytes ?? null,
      orderIndex: props.orderIndex,
      isFree: props.isFree ?? false,
      isRequired: props.isRequired ?? true,
      durationMinutes: props.durationMinutes ?? null,
    });
  }

  static reconstitute(id: EntityId, props: CourseMaterialProps): CourseMaterial {
    return new CourseMaterial(id, { ...props });
  }

  private validate(): void {
    if (!this.props.title) {
      throw new BusinessRuleViolationException('Material title is required.');
    }
    if (!this.props.fileType) {
      throw new BusinessRuleViolationException('Material file type is required.');
    }
    if (!Number.isInteger(this.props.orderIndex) || this.props.orderIndex < 0) {
      throw new BusinessRuleViolationException('Material order index cannot be negative.');
    }
    if (this.props.fileSizeBytes !== null && this.props.fileSizeBytes < 0) {
      throw new BusinessRuleViolationException('File size cannot be negative.');
    }
  }

  get title(): string {
    return this.props.title;
  }

  get description(): string | null {
    return this.props.description;
  }

  get fileUrl(): Url {
    return this.props.fileUrl;
  }

  get fileType(): string {
    return this.props.fileType;
  }

  get fileName(): string | null {
    return this.props.fileName;
  }

  get fileSizeBytes(): number | null {
    return this.props.fileSizeBytes;
  }

  get orderIndex(): number {
    return this.props.orderIndex;
  }

  get isFree(): boolean {
    return this.props.isFree;
  }

  get isRequired(): boolean {
    return this.props.isRequired;
  }

  get durationMinutes(): number | null {
    return this.props.durationMinutes;
  }

  withOrderIndex(orderIndex: number): CourseMaterial {
    return new CourseMaterial(this.id, { ...this.props, orderIndex });
  }

  equals(other: CourseMaterial): boolean {
    return this.id.equals(other.id);
  }
}
