export { slugify } from "./slugify";
