import type {
  AnalysisTier,
  FurnitureGroup,
  ImageAnalysis,
  UploadedImage,
  VisionAttributes,
} from '../../src/grouping/types.js';

export function attrs(overrides: Partial<VisionAttributes> = {}): VisionAttributes {
  return {
    category: '',
    subcategory: '',
    color: '',
    material: '',
    style: '',
    condition: 'Good',
    estimatedPrice: null,
    confidence: 0.8,
    reasoning: '',
    title: null,
    description: null,
    ...overrides,
  };
}

export function makeAnalysis(
  inputIndex: number,
  overrides: Partial<VisionAttributes> & { tier?: AnalysisTier; imageId?: string } = {}
): ImageAnalysis {
  const { tier = 'PRIMARY', imageId = `img_${inputIndex}`, ...rest } = overrides;
  return Object.freeze({
    ...attrs(rest),
    imageId,
    reference: `${imageId}.jpg`,
    inputIndex,
    tier,
  });
}

export function makeImage(index: number, id = `img_${index}`): UploadedImage {
  return {
    imageId: id,
    reference: `${id}.jpg`,
    bytes: Buffer.from(`fake-image-${index}`),
    mimeType: 'image/jpeg',
  };
}

export function expectPartition(groups: readonly FurnitureGroup[], ids: readonly string[]): void {
  const seen = groups.flatMap((g) => g.imageIds);
  expect(seen.slice().sort()).toEqual(ids.slice().sort());
  expect(new Set(seen).size).toBe(seen.length);
  for (const g of groups) {
    expect(g.members.length).toBeGreaterThan(0);
    expect(g.members.map((m) => m.imageId)).toEqual(g.imageIds);
  }
}

export const IVORY_LOVESEAT = {
  title: 'ivory Modern Loveseat',
  category: 'Sofa',
  color: 'ivory',
  style: 'modern',
};

export const CREAM_SOFA = {
  title: 'Cream Contemporary Sofa',
  category: 'Couch',
  color: 'cream',
  style: 'contemporary',
};

export const OAK_DESK = {
  title: 'Oak Writing Desk',
  category: 'Desk',
  color: 'brown',
  style: 'traditional',
};

export const RED_CHAIR = {
  title: 'Red Accent Chair',
  category: 'Chair',
  color: 'red',
  style: 'modern',
};

export const QUEEN_BED = {
  title: 'Queen Bed Frame',
  category: 'Bed',
  color: 'white',
};
