/**
 * ATT&CK Navigator layer document, as consumed by the Navigator.
 * Property order here is the serialized order.
 */

export interface NavigatorMetadataEntry {
  name: 'detections_count' | 'max_severity';
  value: string;
}

export interface NavigatorTechnique {
  techniqueID: string;
  score: number;
  comment: string;
  metadata: NavigatorMetadataEntry[];
}

export interface NavigatorLayer {
  name: string;
  domain: 'enterprise-attack';
  description: string;
  gradient: { minValue: 0; maxValue: 100 };
  layout: { layout: 'side' };
  hideDisabled: false;
  techniques: NavigatorTechnique[];
}
