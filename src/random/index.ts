export {
  RANDOM_STRING_ALPHABET,
  type RandomStringOptions,
  randomString,
} from "./random-string";
