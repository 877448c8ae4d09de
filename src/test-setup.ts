// Decorated classes read and write reflection metadata as soon as they load
import "reflect-metadata";
