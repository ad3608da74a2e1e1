export { FILTER_JOIN, FilterString, joinFilter, type Filter } from "./filter.js";
export { FilterStack } from "./stack.js";
