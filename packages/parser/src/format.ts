import type { AttributeValue, ReferenceSegment } from './ast';

function renderIndex(index: AttributeValue): string {
  switch (index.type) {
    case 'String': {
      return JSON.stringify(index.value);
    }
    case 'Reference': {
      return renderReference(index.value);
    }
    default: {
      return String(index.value);
    }
  }
}

/** Source form of a reference, e.g. `aws_subnet.public[count.index].id` */
export function renderReference(segments: ReferenceSegment[]): string {
  return segments.map((segment) => (segment.index ? `${segment.name}[${renderIndex(segment.index)}]` : segment.name)).join('.');
}
