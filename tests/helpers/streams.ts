export const HEADER = "-- Generated query stream, seed 42\n";

export const Q96 = [
  "-- start query 1 in stream 0 using template query96.tpl",
  "select count(*)",
  "from store_sales",
  "where ss_quantity > 10",
  ";",
  "-- end query 1 in stream 0 using template query96.tpl",
  "",
  "",
].join("\n");

export const Q14 = [
  "-- start query 2 in stream 0 using template query14.tpl",
  "with cross_items as (select i_item_sk from item)",
  "select channel from cross_items",
  ";",
  "with cross_items as (select i_item_sk from item)",
  "select this_year from cross_items",
  ";",
  "-- end query 2 in stream 0 using template query14.tpl",
  "",
  "",
].join("\n");

export const Q14_PART1 = [
  "-- start query 2 in stream 0 using template query14_part1.tpl",
  "with cross_items as (select i_item_sk from item)",
  "select channel from cross_items",
  ";",
].join("\n");

export const Q14_PART2 = [
  "-- start query 2 in stream 0 using template query14_part2.tpl",
  "with cross_items as (select i_item_sk from item)",
  "select this_year from cross_items",
  ";",
].join("\n");

/** Semicolons inside a literal and a comment must not split this one */
export const Q7 = [
  "-- start query 3 in stream 0 using template query7.tpl",
  "select i_item_id, 'a;b' as marker -- not; a split",
  "from item",
  ";",
  "-- end query 3 in stream 0 using template query7.tpl",
  "",
].join("\n");

export const STREAM = HEADER + Q96 + Q14 + Q7;
