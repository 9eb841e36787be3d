// entity decorators emit design-type metadata when their modules load
import 'reflect-metadata'
