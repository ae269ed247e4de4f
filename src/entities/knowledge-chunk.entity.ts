import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('knowledge_chunks')
export class KnowledgeChunkEntity {
  @PrimaryColumn('varchar')
  id!: string;

  // corpus line order; ties in similarity resolve by it
  @Index()
  @Column('integer')
  position!: number;

  @Column('text')
  text!: string;

  @Column('varchar', { default: '' })
  sourceName!: string;

  @Column('varchar', { default: '' })
  sourceUrl!: string;

  @Column('varchar')
  category!: string;

  @Column('simple-json')
  tags!: string[];

  @Column('simple-json')
  embedding!: number[];

  @Column('varchar')
  embedProvider!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
