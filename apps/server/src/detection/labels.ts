import cocoLabels from './coco-labels.json';

export const COCO_LABELS: readonly string[] = cocoLabels;

export function labelFor(classId: number, labels: readonly string[] = COCO_LABELS): string {
	return labels[classId] ?? `class_${classId}`;
}
