import { Accessor, Document, NodeIO, Primitive } from '@gltf-transform/core';
import type { Mesh as GltfMesh } from '@gltf-transform/core';
import type { Mesh, MeshMaterial } from '../pipeline/types.js';

export interface MeshAsset {
  mesh: Mesh;
  material?: MeshMaterial;
}

const io = new NodeIO();

export const triangleCount = (mesh: Mesh): number => Math.floor(mesh.indices.length / 3);

/**
 * Serialize a mesh (and its base colour texture, when present) as a binary glTF container.
 */
export async function encodeGlb({ mesh, material }: MeshAsset): Promise<Uint8Array> {
  const doc = new Document();
  const buffer = doc.createBuffer();

  const primitive = doc
    .createPrimitive()
    .setAttribute(
      'POSITION',
      doc.createAccessor('position').setType(Accessor.Type.VEC3).setArray(mesh.positions).setBuffer(buffer),
    )
    .setIndices(
      doc.createAccessor('indices').setType(Accessor.Type.SCALAR).setArray(mesh.indices).setBuffer(buffer),
    );

  if (mesh.normals) {
    primitive.setAttribute(
      'NORMAL',
      doc.createAccessor('normal').setType(Accessor.Type.VEC3).setArray(mesh.normals).setBuffer(buffer),
    );
  }
  if (mesh.uvs) {
    primitive.setAttribute(
      'TEXCOORD_0',
      doc.createAccessor('uv').setType(Accessor.Type.VEC2).setArray(mesh.uvs).setBuffer(buffer),
    );
  }

  if (material) {
    const texture = doc
      .createTexture('baseColor')
      .setImage(new Uint8Array(material.baseColorTexture))
      .setMimeType(material.mimeType);
    primitive.setMaterial(doc.createMaterial('surface').setBaseColorTexture(texture));
  }

  const node = doc.createNode('model').setMesh(doc.createMesh('model').addPrimitive(primitive));
  doc.createScene('scene').addChild(node);

  return io.writeBinary(doc);
}

type Matrix4 = ArrayLike<number>;

const IDENTITY: Matrix4 = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

const append = (target: number[], source: ArrayLike<number>, offset = 0) => {
  for (let i = 0; i < source.length; i++) target.push(source[i] + offset);
};

const readFloats = (primitive: Primitive, semantic: string): Float32Array | undefined => {
  const array = primitive.getAttribute(semantic)?.getArray();
  return array ? Float32Array.from(array) : undefined;
};

/** Column-major 4x4 applied to xyz triples (w = 1). */
const appendPoints = (target: number[], points: Float32Array, m: Matrix4) => {
  for (let i = 0; i < points.length; i += 3) {
    const x = points[i];
    const y = points[i + 1];
    const z = points[i + 2];
    target.push(
      m[0] * x + m[4] * y + m[8] * z + m[12],
      m[1] * x + m[5] * y + m[9] * z + m[13],
      m[2] * x + m[6] * y + m[10] * z + m[14],
    );
  }
};

const determinant3 = (m: Matrix4) =>
  m[0] * (m[5] * m[10] - m[9] * m[6]) - m[4] * (m[1] * m[10] - m[9] * m[2]) + m[8] * (m[1] * m[6] - m[5] * m[2]);

/** Normals go through the inverse transpose of the upper 3x3, then are renormalized. */
const appendNormals = (target: number[], normals: Float32Array, m: Matrix4) => {
  // Cofactors of the upper 3x3 (row-major), i.e. det * inverse transpose.
  const c = [
    m[5] * m[10] - m[9] * m[6],
    m[9] * m[2] - m[1] * m[10],
    m[1] * m[6] - m[5] * m[2],
    m[8] * m[6] - m[4] * m[10],
    m[0] * m[10] - m[8] * m[2],
    m[4] * m[2] - m[0] * m[6],
    m[4] * m[9] - m[8] * m[5],
    m[8] * m[1] - m[0] * m[9],
    m[0] * m[5] - m[4] * m[1],
  ];
  const sign = determinant3(m) < 0 ? -1 : 1;
  for (let i = 0; i < normals.length; i += 3) {
    const x = normals[i];
    const y = normals[i + 1];
    const z = normals[i + 2];
    const nx = sign * (c[0] * x + c[1] * y + c[2] * z);
    const ny = sign * (c[3] * x + c[4] * y + c[5] * z);
    const nz = sign * (c[6] * x + c[7] * y + c[8] * z);
    const length = Math.hypot(nx, ny, nz) || 1;
    target.push(nx / length, ny / length, nz / length);
  }
};

interface MeshInstance {
  mesh: GltfMesh;
  matrix: Matrix4;
}

/** Every mesh placed in the node graph, with its world transform. Unplaced meshes count once, untransformed. */
const listInstances = (doc: Document): MeshInstance[] => {
  const root = doc.getRoot();
  const instances: MeshInstance[] = [];
  for (const node of root.listNodes()) {
    const mesh = node.getMesh();
    if (mesh) instances.push({ mesh, matrix: node.getWorldMatrix() });
  }
  if (instances.length > 0) return instances;
  return root.listMeshes().map((mesh) => ({ mesh, matrix: IDENTITY }));
};

/**
 * Parse a binary glTF container into a single mesh.
 * Every placed primitive is baked into world space and merged; normals and uvs are kept only
 * when every primitive has them. Only triangle-list primitives are accepted.
 */
export async function decodeGlb(bytes: Uint8Array): Promise<MeshAsset> {
  const doc = await io.readBinary(bytes);
  const parts = listInstances(doc).flatMap(({ mesh, matrix }) =>
    mesh.listPrimitives().map((primitive) => ({ primitive, matrix })),
  );

  if (parts.length === 0) {
    throw new Error('GLB contains no mesh primitives');
  }

  const positions: number[] = [];
  const indices: number[] = [];
  const normals: number[] = [];
  const uvs: number[] = [];
  let keepNormals = true;
  let keepUvs = true;
  let material: MeshMaterial | undefined;

  for (const { primitive, matrix } of parts) {
    const mode = primitive.getMode();
    if (mode !== Primitive.Mode.TRIANGLES) {
      throw new Error(`GLB primitive uses unsupported mode ${mode}; only triangle lists are supported`);
    }
    const position = readFloats(primitive, 'POSITION');
    if (!position) {
      throw new Error('GLB primitive has no POSITION attribute');
    }
    const offset = positions.length / 3;
    const vertexCount = position.length / 3;
    const primitiveIndices = primitive.getIndices()?.getArray();
    const triangles: number[] = [];

    appendPoints(positions, position, matrix);
    if (primitiveIndices) {
      append(triangles, primitiveIndices, offset);
    } else {
      for (let i = 0; i < vertexCount; i++) triangles.push(i + offset);
    }
    // A mirroring transform flips the winding.
    if (determinant3(matrix) < 0) {
      for (let i = 0; i + 2 < triangles.length; i += 3) {
        [triangles[i + 1], triangles[i + 2]] = [triangles[i + 2], triangles[i + 1]];
      }
    }
    append(indices, triangles);

    const normal = readFloats(primitive, 'NORMAL');
    const uv = readFloats(primitive, 'TEXCOORD_0');
    keepNormals = keepNormals && normal !== undefined;
    keepUvs = keepUvs && uv !== undefined;
    if (normal) appendNormals(normals, normal, matrix);
    if (uv) append(uvs, uv);

    const texture = primitive.getMaterial()?.getBaseColorTexture();
    const image = texture?.getImage();
    if (!material && texture && image) {
      material = { baseColorTexture: Buffer.from(image), mimeType: texture.getMimeType() || 'image/png' };
    }
  }

  const mesh: Mesh = {
    positions: Float32Array.from(positions),
    indices: Uint32Array.from(indices),
    ...(keepNormals && { normals: Float32Array.from(normals) }),
    ...(keepUvs && { uvs: Float32Array.from(uvs) }),
  };

  return material ? { mesh, material } : { mesh };
}
