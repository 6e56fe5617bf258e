/**
 * Shared value snapshots for tests
 *
 * The descriptor here has two transforms:
 *   embed         [0] -> [1, 2, 3]   up_lengths [2, 4, 8], coefficients [32, 8, 1]
 *   pass_through  [1] -> [4]
 * with bottom id 0 and top ids [3, 4].
 */

import type { ValueSnapshot } from "../value/snapshot.js";

const constants = (values: readonly number[]): string =>
  `ck_tile::tuple<${values.map((value) => `ck_tile::constant<${value}>`).join(", ")} >`;

export const EMBED_TYPE = `ck_tile::embed<${constants([2, 4, 8])}, ${constants([32, 8, 1])} >`;

export const PASS_THROUGH_TYPE = "ck_tile::pass_through<ck_tile::constant<2> >";

export const DESCRIPTOR_TYPE =
  `ck_tile::tensor_descriptor<ck_tile::tuple<${EMBED_TYPE}, ${PASS_THROUGH_TYPE} >, ` +
  "ck_tile::tuple<ck_tile::sequence<0>, ck_tile::sequence<1> >, " +
  "ck_tile::tuple<ck_tile::sequence<1, 2, 3>, ck_tile::sequence<4> >, " +
  "ck_tile::sequence<3, 4>, long, ck_tile::sequence<-1, -1>, ck_tile::sequence<-1, -1> >";

export const ADAPTOR_TYPE =
  `ck_tile::tensor_adaptor<ck_tile::tuple<${PASS_THROUGH_TYPE} >, ` +
  "ck_tile::tuple<ck_tile::sequence<0> >, " +
  "ck_tile::tuple<ck_tile::sequence<1> >, " +
  "ck_tile::sequence<0>, ck_tile::sequence<1> >";

export const BUFFER_VIEW_TYPE =
  "ck_tile::buffer_view<(ck_tile::address_space_enum)1, float, int, true, (ck_tile::amd_buffer_coherence_enum)0>";

export const TENSOR_VIEW_TYPE = `ck_tile::tensor_view<${BUFFER_VIEW_TYPE}, ${DESCRIPTOR_TYPE}, (ck_tile::memory_operation_enum)0>`;

export const embedSnapshot = (): ValueSnapshot => ({
  type: EMBED_TYPE,
  fields: {
    up_lengths_: { type: constants([2, 4, 8]) },
    coefficients_: { type: constants([32, 8, 1]) },
  },
});

export const passThroughSnapshot = (): ValueSnapshot => ({
  type: PASS_THROUGH_TYPE,
  fields: {
    up_lengths_: {
      type: "ck_tile::tuple<int>",
      elements: [{ type: "int", value: 2 }],
    },
  },
});

export const descriptorSnapshot = (
  transforms: readonly ValueSnapshot[] = [embedSnapshot(), passThroughSnapshot()],
  elementSpaceSize: ValueSnapshot = { type: "long", value: 64 }
): ValueSnapshot => ({
  type: DESCRIPTOR_TYPE,
  fields: {
    transforms_: {
      type: `ck_tile::tuple<${EMBED_TYPE}, ${PASS_THROUGH_TYPE} >`,
      elements: transforms,
    },
    element_space_size_: elementSpaceSize,
  },
});

export const tensorViewSnapshot = (
  descriptor: ValueSnapshot = descriptorSnapshot()
): ValueSnapshot => ({
  type: TENSOR_VIEW_TYPE,
  fields: {
    buf_: {
      type: BUFFER_VIEW_TYPE,
      fields: { p_data_: { type: "float*", value: "0x7f0000001000" } },
    },
    desc_: descriptor,
  },
});

export const tupleSnapshot = (
  elements: readonly ValueSnapshot[],
  elementTypes: readonly string[] = elements.map((element) => element.type)
): ValueSnapshot => ({
  type: `ck_tile::tuple<${elementTypes.join(", ")}>`,
  elements,
});

export const ENCODING_TYPE =
  "ck_tile::tile_distribution_encoding<ck_tile::sequence<1>, " +
  "ck_tile::tuple<ck_tile::sequence<4, 16>, ck_tile::sequence<4, 16> >, " +
  "ck_tile::tuple<ck_tile::sequence<1, 2>, ck_tile::sequence<0, 2> >, " +
  "ck_tile::tuple<ck_tile::sequence<0, 0>, ck_tile::sequence<0, 1> >, " +
  "ck_tile::sequence<1, 2>, ck_tile::sequence<1, 1> >";

export const DISTRIBUTION_TYPE = `ck_tile::tile_distribution<${ADAPTOR_TYPE}, ${DESCRIPTOR_TYPE}, ${ENCODING_TYPE}, ck_tile::detail::tile_distribution_detail<ck_tile::sequence<0> > >`;

export const WINDOW_TYPE = `ck_tile::tile_window_with_static_distribution<${TENSOR_VIEW_TYPE}, ${constants([64, 32])}, ${DISTRIBUTION_TYPE}, 1>`;

export const windowSnapshot = (): ValueSnapshot => ({
  type: WINDOW_TYPE,
  fields: {
    bottom_tensor_view_: tensorViewSnapshot(),
    window_origin_: {
      type: "ck_tile::array<int, 2>",
      fields: {
        data: {
          type: "int [2]",
          elements: [
            { type: "int", value: 0 },
            { type: "int", value: 32 },
          ],
        },
      },
    },
    pre_computed_coords_: { type: "ck_tile::array<ck_tile::tuple<>, 1>", elements: [] },
  },
});
