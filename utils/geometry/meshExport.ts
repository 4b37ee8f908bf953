/**
 * MESH EXPORT
 *
 * CSG solids → indexed three.js meshes → binary STL, and a zip bundle for
 * exporting every part at once. Coordinates are mm with Z up, which is what
 * slicers expect, so no axis swap is needed.
 */

import * as THREE from 'three';
import { STLExporter, mergeVertices } from 'three-stdlib';
import JSZip from 'jszip';
import { geometries } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';

export interface ExportedFile {
  filename: string;
  data: Uint8Array;
}

/** Fan-triangulates the solid's convex polygons and welds shared vertices. */
export const toBufferGeometry = (solid: Geom3): THREE.BufferGeometry => {
  const positions: number[] = [];

  for (const polygon of geometries.geom3.toPolygons(solid)) {
    const [first, ...rest] = polygon.vertices;
    for (let i = 1; i < rest.length; i++) {
      positions.push(...first, ...rest[i - 1], ...rest[i]);
    }
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.Float32BufferAttribute(positions, 3));
  const merged = mergeVertices(geometry, 1e-4);
  merged.computeVertexNormals();
  geometry.dispose();

  return merged;
};

export const triangleCount = (geometry: THREE.BufferGeometry): number => {
  const index = geometry.getIndex();
  return index ? index.count / 3 : geometry.getAttribute('position').count / 3;
};

export const exportStl = (solid: Geom3): Uint8Array => {
  const geometry = toBufferGeometry(solid);
  const mesh = new THREE.Mesh(geometry);
  mesh.updateMatrixWorld(true);

  try {
    const view = new STLExporter().parse(mesh, { binary: true });
    return new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
  } finally {
    geometry.dispose();
  }
};

export const exportBundle = async (files: ExportedFile[]): Promise<Uint8Array> => {
  const zip = new JSZip();
  for (const file of files) {
    zip.file(file.filename, file.data);
  }
  return zip.generateAsync({ type: 'uint8array' });
};
